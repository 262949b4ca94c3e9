import { ConflictException } from '@nestjs/common';
import { LearningLevel } from '../common/constants/learning-levels';
import {
  TutoringSession,
  TutoringStage,
} from './interfaces/tutoring-session.interface';

export function getTutoringStage(session: TutoringSession): TutoringStage {
  if (!session.subtopic) return 'subtopic-selection';
  if (!session.mode) return 'mode-selection';
  return session.mode;
}

export function assertStage(
  session: TutoringSession,
  ...allowed: TutoringStage[]
): void {
  const stage = getTutoringStage(session);
  if (!allowed.includes(stage)) {
    throw new ConflictException(
      `Not available while the session is in ${stage} (expected ${allowed.join(' or ')})`
    );
  }
}

export function requireSubtopic(session: TutoringSession): string {
  if (!session.subtopic) {
    throw new ConflictException('Choose a subtopic first');
  }
  return session.subtopic;
}

export function isQuizComplete(session: TutoringSession): boolean {
  return (
    session.quizQuestions.length > 0 &&
    session.currentQuestion >= session.quizQuestions.length
  );
}

export interface NewTutoringSession {
  id: string;
  ownerKey: string;
  userId: number | null;
  topic: string;
  learningLevel: LearningLevel;
  subtopics: string[];
}

export function createTutoringSession(
  params: NewTutoringSession,
  now: Date = new Date()
): TutoringSession {
  const timestamp = now.toISOString();
  return {
    ...params,
    subtopic: null,
    mode: null,
    chatHistory: [],
    learningProgress: 0,
    lessonStartedAt: null,
    quizQuestions: [],
    currentQuestion: 0,
    quizScore: 0,
    quizAnswers: [],
    revision: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}
