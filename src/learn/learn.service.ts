import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import {
  AssessmentParams,
  ChatMessage,
  TutorReplyParams,
} from '../ai/interfaces/ai-service.interface';
import {
  AdaptationStrategy,
  fallbackAdaptationStrategy,
} from '../common/constants/teaching-adaptations';
import { getErrorMessage } from '../common/utils/error.utils';
import { LearningHistoryService } from '../learning-history/learning-history.service';
import { TutoringSession } from '../tutoring/interfaces/tutoring-session.interface';
import { requireSubtopic } from '../tutoring/tutoring-session.utils';

export const DONT_KNOW_MESSAGE = "I don't know";

/** Scores below this leave progress unchanged */
export const PROGRESS_SCORE_THRESHOLD = 5;
export const FALLBACK_ASSESSMENT_SCORE = 5;
export const MAX_PROGRESS = 100;

export const FALLBACK_REPLY =
  "That's a great question! Let's explore this together and move forward in our learning journey...";

export interface LearnInput {
  message?: string;
  dontKnow?: boolean;
}

export interface LearnTurnResult {
  reply: string;
  /** Null when the model named no known strategy */
  adaptation: AdaptationStrategy | null;
  score: number;
  progress: number;
}

export function fallbackLessonIntro(subtopic: string, topic: string): string {
  return `🎓 Welcome to ${subtopic}! This is an important area within ${topic} that will help you understand the bigger picture. Let's explore what this involves and why it matters. What do you think this subtopic might cover?`;
}

/**
 * Progress after a turn scored `score` (0-10)
 */
export function advanceProgress(progress: number, score: number): number {
  if (score < PROGRESS_SCORE_THRESHOLD) return progress;
  const increment = Math.min(score, MAX_PROGRESS - progress);
  return Math.min(MAX_PROGRESS, progress + increment);
}

function lastTeacherMessage(history: ChatMessage[]): string {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].role === 'ai') return history[i].content;
  }
  return '';
}

/**
 * The "teach me" chat loop. Every model call has a fallback, so a turn only
 * fails on invalid input or when saving the history row fails.
 */
@Injectable()
export class LearnService {
  private readonly logger = new Logger(LearnService.name);

  constructor(
    private readonly aiService: AiService,
    private readonly learningHistoryService: LearningHistoryService
  ) {}

  /**
   * Opens the lesson when the chat is still empty
   */
  async startLesson(session: TutoringSession): Promise<void> {
    if (session.chatHistory.length > 0) return;

    const subtopic = requireSubtopic(session);
    let intro: string;
    try {
      intro = await this.aiService.generateLessonIntro({
        subtopic,
        topic: session.topic,
        learningLevel: session.learningLevel,
      });
    } catch (error) {
      this.logger.error(
        `Lesson intro failed for "${subtopic}": ${getErrorMessage(error)}`
      );
      intro = fallbackLessonIntro(subtopic, session.topic);
    }

    session.chatHistory.push({ role: 'ai', content: intro });
  }

  async respond(
    session: TutoringSession,
    input: LearnInput
  ): Promise<LearnTurnResult> {
    const userInput = input.dontKnow
      ? DONT_KNOW_MESSAGE
      : (input.message ?? '').trim();
    if (!userInput) {
      throw new BadRequestException(
        'Type a message or answer "I don\'t know" to continue'
      );
    }

    const subtopic = requireSubtopic(session);
    const { topic, learningLevel } = session;
    const progress = session.learningProgress;
    const previousTeacherMessage = lastTeacherMessage(session.chatHistory);

    session.chatHistory.push({ role: 'user', content: userInput });

    const adaptation = await this.chooseAdaptation(
      userInput,
      progress,
      learningLevel
    );

    const [reply, score] = await Promise.all([
      this.generateReply({
        userInput,
        subtopic,
        topic,
        learningLevel,
        progress,
        chatHistory: [...session.chatHistory],
        adaptation,
      }),
      this.assess({
        userInput,
        previousTeacherMessage,
        subtopic,
        learningLevel,
      }),
    ]);

    session.chatHistory.push({ role: 'ai', content: reply });
    session.learningProgress = advanceProgress(progress, score);

    this.saveProgress(session, subtopic);

    return {
      reply,
      adaptation,
      score,
      progress: session.learningProgress,
    };
  }

  private async chooseAdaptation(
    userInput: string,
    progress: number,
    learningLevel: string
  ): Promise<AdaptationStrategy | null> {
    try {
      return await this.aiService.chooseAdaptation({
        userInput,
        progress,
        learningLevel,
      });
    } catch (error) {
      this.logger.warn(`Adaptation failed: ${getErrorMessage(error)}`);
      return fallbackAdaptationStrategy(progress);
    }
  }

  private async generateReply(params: TutorReplyParams): Promise<string> {
    try {
      return await this.aiService.generateTutorReply(params);
    } catch (error) {
      this.logger.error(`Tutor reply failed: ${getErrorMessage(error)}`);
      return FALLBACK_REPLY;
    }
  }

  private async assess(params: AssessmentParams): Promise<number> {
    try {
      return await this.aiService.assessResponse(params);
    } catch (error) {
      this.logger.warn(`Assessment failed: ${getErrorMessage(error)}`);
      return FALLBACK_ASSESSMENT_SCORE;
    }
  }

  private saveProgress(session: TutoringSession, subtopic: string): void {
    if (session.userId === null) return;

    this.learningHistoryService.saveSession({
      userId: session.userId,
      topic: session.topic,
      subtopic,
      learningLevel: session.learningLevel,
      mode: 'learn',
      progress: session.learningProgress,
      chatHistory: session.chatHistory,
      quizScore: 0,
      quizTotal: 0,
    });
  }
}
