export const LEARNING_MODES = ['learn', 'quiz'] as const;

export type LearningMode = (typeof LEARNING_MODES)[number];
