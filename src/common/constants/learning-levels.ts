export const LEARNING_LEVELS = ['elementary', 'middle', 'high', 'adult'] as const;

export type LearningLevel = (typeof LEARNING_LEVELS)[number];

export const DEFAULT_LEARNING_LEVEL: LearningLevel = 'middle';

export interface TeachingStyle {
  tone: string;
  language: string;
  approach: string;
}

interface LevelProfile {
  label: string;
  style: TeachingStyle;
  /** What broad subtopics for this audience should cover */
  subtopicFocus: string;
  /** Served, shuffled, when subtopic generation fails */
  fallbackSubtopics: string[];
}

const LEVEL_PROFILES: Record<LearningLevel, LevelProfile> = {
  elementary: {
    label: 'Elementary School',
    style: {
      tone: 'warm, patient and encouraging, like a caring elementary teacher',
      language: 'simple and clear, with plenty of examples and analogies',
      approach: 'hands-on, concrete and step by step',
    },
    subtopicFocus:
      'basic concepts, foundational skills, hands-on activities and fun learning',
    fallbackSubtopics: [
      'Basic Concepts',
      'Simple Examples',
      'Fun Activities',
      'Easy Practice',
      'Real World Uses',
    ],
  },
  middle: {
    label: 'Middle School',
    style: {
      tone: 'enthusiastic and supportive, like a middle school teacher who believes in you',
      language: 'clear but a little more sophisticated, with relatable examples',
      approach: 'builds critical thinking while keeping a clear structure',
    },
    subtopicFocus:
      'building on basics, practical applications, critical thinking and real-world connections',
    fallbackSubtopics: [
      'Building Skills',
      'Practical Applications',
      'Problem Solving',
      'Critical Thinking',
      'Hands-on Projects',
    ],
  },
  high: {
    label: 'High School',
    style: {
      tone: 'professional yet approachable, like a knowledgeable high school teacher',
      language: 'richer vocabulary and detailed explanations',
      approach: 'encourages independent thinking and deeper analysis',
    },
    subtopicFocus:
      'advanced concepts, detailed analysis, complex applications and theoretical understanding',
    fallbackSubtopics: [
      'Advanced Concepts',
      'Detailed Analysis',
      'Complex Applications',
      'Theoretical Understanding',
      'Career Preparation',
    ],
  },
  adult: {
    label: 'Adult',
    style: {
      tone: 'professional and collaborative, like a subject matter expert',
      language: 'sophisticated vocabulary that assumes prior knowledge',
      approach: 'focuses on practical applications and advanced concepts',
    },
    subtopicFocus:
      'professional applications, advanced techniques, industry relevance and specialized knowledge',
    fallbackSubtopics: [
      'Professional Skills',
      'Advanced Techniques',
      'Industry Applications',
      'Specialized Knowledge',
      'Practical Implementation',
    ],
  },
};

export function isLearningLevel(value: unknown): value is LearningLevel {
  return (
    typeof value === 'string' &&
    LEARNING_LEVELS.some((level) => level === value)
  );
}

/**
 * Unknown levels are treated as middle school
 */
export function normalizeLearningLevel(value: string): LearningLevel {
  return isLearningLevel(value) ? value : DEFAULT_LEARNING_LEVEL;
}

export function getLevelProfile(level: string): LevelProfile {
  return LEVEL_PROFILES[normalizeLearningLevel(level)];
}

export function formatLearningLevel(level: string): string {
  if (isLearningLevel(level)) return LEVEL_PROFILES[level].label;
  return level.charAt(0).toUpperCase() + level.slice(1).toLowerCase();
}
