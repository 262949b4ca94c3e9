import { ChatMessage } from '../ai/interfaces/ai-service.interface';
import { formatLearningLevel } from '../common/constants/learning-levels';
import { LearningMode } from '../common/constants/learning-modes';
import {
  QuizAnswerRecord,
  TutoringSession,
  TutoringStage,
} from './interfaces/tutoring-session.interface';
import { getTutoringStage, isQuizComplete } from './tutoring-session.utils';

export interface QuizQuestionView {
  number: number;
  question: string;
  options: string[];
  /** Only for answered questions */
  correctAnswer?: number;
  explanation?: string;
}

export interface QuizView {
  total: number;
  currentQuestion: number;
  score: number;
  completed: boolean;
  questions: QuizQuestionView[];
  answers: QuizAnswerRecord[];
}

export interface TutoringSessionView {
  id: string;
  stage: TutoringStage;
  topic: string;
  learningLevel: string;
  learningLevelLabel: string;
  subtopics: string[];
  subtopic: string | null;
  mode: LearningMode | null;
  chatHistory: ChatMessage[];
  learningProgress: number;
  lessonStartedAt: string | null;
  quiz: QuizView | null;
  createdAt: string;
  updatedAt: string;
}

export function toQuizView(session: TutoringSession): QuizView | null {
  if (session.quizQuestions.length === 0) return null;

  return {
    total: session.quizQuestions.length,
    currentQuestion: session.currentQuestion,
    score: session.quizScore,
    completed: isQuizComplete(session),
    questions: session.quizQuestions.map((question, index) =>
      index < session.currentQuestion
        ? {
            number: index + 1,
            question: question.question,
            options: question.options,
            correctAnswer: question.correctAnswer,
            explanation: question.explanation,
          }
        : {
            number: index + 1,
            question: question.question,
            options: question.options,
          }
    ),
    answers: session.quizAnswers,
  };
}

export function toTutoringSessionView(
  session: TutoringSession
): TutoringSessionView {
  return {
    id: session.id,
    stage: getTutoringStage(session),
    topic: session.topic,
    learningLevel: session.learningLevel,
    learningLevelLabel: formatLearningLevel(session.learningLevel),
    subtopics: session.subtopics,
    subtopic: session.subtopic,
    mode: session.mode,
    chatHistory: session.chatHistory,
    learningProgress: session.learningProgress,
    lessonStartedAt: session.lessonStartedAt,
    quiz: toQuizView(session),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}
