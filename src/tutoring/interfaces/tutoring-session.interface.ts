import {
  ChatMessage,
  QuizQuestion,
} from '../../ai/interfaces/ai-service.interface';
import { LearningLevel } from '../../common/constants/learning-levels';
import { LearningMode } from '../../common/constants/learning-modes';

export type TutoringStage =
  | 'subtopic-selection'
  | 'mode-selection'
  | 'learn'
  | 'quiz';

export interface QuizAnswerRecord {
  question: string;
  userAnswer: string;
  correctAnswer: string;
  isCorrect: boolean;
  explanation: string;
}

/**
 * Server-side state of one tutoring session, stored in the cache
 */
export interface TutoringSession {
  id: string;
  ownerKey: string;
  /** Null for guests; only registered users get history rows */
  userId: number | null;
  topic: string;
  learningLevel: LearningLevel;
  subtopics: string[];
  subtopic: string | null;
  mode: LearningMode | null;

  chatHistory: ChatMessage[];
  /** 0-100 */
  learningProgress: number;
  lessonStartedAt: string | null;

  quizQuestions: QuizQuestion[];
  /** Index of the next question to answer; equals the length once complete */
  currentQuestion: number;
  quizScore: number;
  quizAnswers: QuizAnswerRecord[];

  /** Bumped on every save; a copy read before the latest save cannot be written back */
  revision: number;
  createdAt: string;
  updatedAt: string;
}
