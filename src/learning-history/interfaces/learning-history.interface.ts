import { ChatMessage } from '../../ai/interfaces/ai-service.interface';
import { LearningMode } from '../../common/constants/learning-modes';

/** Identifies one history row; a user has at most one per key */
export interface LearningSessionKey {
  userId: number;
  topic: string;
  subtopic: string;
  learningLevel: string;
}

export interface SaveLearningSessionParams extends LearningSessionKey {
  mode: LearningMode;
  progress: number;
  chatHistory: ChatMessage[];
  quizScore: number;
  quizTotal: number;
}

export interface LearningHistoryEntry {
  id: number;
  topic: string;
  subtopic: string;
  learningLevel: string;
  learningLevelLabel: string;
  mode: string;
  progress: number;
  chatHistory: ChatMessage[];
  quizScore: number;
  quizTotal: number;
  /** Set for quizzes with at least one question */
  quizPercentage: number | null;
  startedAt: string;
  lastAccessed: string;
}

export interface HistoryFilter {
  mode?: LearningMode;
  page: number;
  limit: number;
}
