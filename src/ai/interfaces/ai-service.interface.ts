import { AdaptationStrategy } from '../../common/constants/teaching-adaptations';

export type ChatRole = 'user' | 'ai';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface QuizQuestion {
  question: string;
  options: string[];
  /** Index into `options` */
  correctAnswer: number;
  explanation: string;
}

export interface LessonParams {
  subtopic: string;
  topic: string;
  learningLevel: string;
}

export interface AdaptationParams {
  userInput: string;
  progress: number;
  learningLevel: string;
}

export interface TutorReplyParams extends LessonParams {
  userInput: string;
  progress: number;
  /** Conversation so far, oldest first; only the tail is sent */
  chatHistory: ChatMessage[];
  adaptation: AdaptationStrategy | null;
}

export interface AssessmentParams {
  userInput: string;
  previousTeacherMessage: string;
  subtopic: string;
  learningLevel: string;
}

export interface IAiService {
  generateSubtopics(topic: string, learningLevel: string): Promise<string[]>;
  checkSubtopicRelevance(subtopic: string, topic: string): Promise<boolean>;
  generateLessonIntro(params: LessonParams): Promise<string>;
  chooseAdaptation(params: AdaptationParams): Promise<AdaptationStrategy | null>;
  generateTutorReply(params: TutorReplyParams): Promise<string>;
  assessResponse(params: AssessmentParams): Promise<number>;
  generateQuiz(params: LessonParams): Promise<QuizQuestion[]>;
}
