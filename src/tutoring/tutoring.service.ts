import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { AuthUser } from '../auth/interfaces/auth-user.interface';
import { LearningMode } from '../common/constants/learning-modes';
import { LearnService, LearnTurnResult } from '../learn/learn.service';
import { LearningHistoryService } from '../learning-history/learning-history.service';
import { QuizAnswerOutcome, QuizResult, QuizService } from '../quiz/quiz.service';
import { TopicService } from '../topic/topic.service';
import {
  AnswerQuestionDto,
  CreateTutoringSessionDto,
  ResumeSessionDto,
  SendMessageDto,
} from './dto/tutoring.dto';
import { TutoringSession } from './interfaces/tutoring-session.interface';
import { TutoringSessionStore } from './tutoring-session.store';
import { assertStage, requireSubtopic } from './tutoring-session.utils';
import {
  TutoringSessionView,
  toTutoringSessionView,
} from './tutoring-session.view';

export interface LearnTurnResponse extends LearnTurnResult {
  session: TutoringSessionView;
}

export interface QuizAnswerResponse extends QuizAnswerOutcome {
  session: TutoringSessionView;
}

/**
 * Walks a tutoring session through subtopic selection, mode selection and
 * then the lesson chat or the quiz. Every mutation is written back to the
 * store before the view is returned.
 */
@Injectable()
export class TutoringService {
  private readonly logger = new Logger(TutoringService.name);

  constructor(
    private readonly store: TutoringSessionStore,
    private readonly topicService: TopicService,
    private readonly learnService: LearnService,
    private readonly quizService: QuizService,
    private readonly learningHistoryService: LearningHistoryService
  ) {}

  async create(
    user: AuthUser,
    dto: CreateTutoringSessionDto
  ): Promise<TutoringSessionView> {
    const topic = dto.topic.trim();
    if (!topic) {
      throw new BadRequestException('Please enter a topic to continue!');
    }

    const subtopics = await this.topicService.generateSubtopics(
      topic,
      dto.learningLevel
    );
    const session = await this.store.create({
      ownerKey: user.ownerKey,
      userId: user.userId,
      topic,
      learningLevel: dto.learningLevel,
      subtopics,
    });

    return toTutoringSessionView(session);
  }

  async getSession(user: AuthUser, id: string): Promise<TutoringSessionView> {
    const session = await this.store.get(id, user.ownerKey);
    return toTutoringSessionView(session);
  }

  async listSessions(user: AuthUser): Promise<TutoringSessionView[]> {
    const ids = await this.store.getOwnerSessionIds(user.ownerKey);
    const views: TutoringSessionView[] = [];

    for (const id of ids) {
      try {
        views.push(await this.getSession(user, id));
      } catch (error) {
        // Expired entries linger in the owner index until its own TTL runs out
        if (!(error instanceof NotFoundException)) throw error;
      }
    }
    return views;
  }

  async deleteSession(user: AuthUser, id: string): Promise<void> {
    await this.store.remove(id, user.ownerKey);
  }

  async selectSubtopic(
    user: AuthUser,
    id: string,
    subtopic: string
  ): Promise<TutoringSessionView> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'subtopic-selection');

    const chosen = subtopic.trim();
    if (!session.subtopics.includes(chosen)) {
      throw new BadRequestException('Choose one of the suggested subtopics');
    }

    return this.commitSubtopic(session, chosen);
  }

  async selectCustomSubtopic(
    user: AuthUser,
    id: string,
    subtopic: string
  ): Promise<TutoringSessionView> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'subtopic-selection');

    const chosen = subtopic.trim();
    if (!chosen) {
      throw new BadRequestException('Please enter a subtopic to continue!');
    }

    const related = await this.topicService.isRelatedSubtopic(
      chosen,
      session.topic
    );
    if (!related) {
      throw new BadRequestException(
        'This subtopic is unrelated to the chosen topic.'
      );
    }

    return this.commitSubtopic(session, chosen);
  }

  async selectMode(
    user: AuthUser,
    id: string,
    mode: LearningMode
  ): Promise<TutoringSessionView> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'mode-selection');

    await this.enterMode(session, mode);
    await this.store.save(session);
    return toTutoringSessionView(session);
  }

  async sendMessage(
    user: AuthUser,
    id: string,
    dto: SendMessageDto
  ): Promise<LearnTurnResponse> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'learn');

    const turn = await this.learnService.respond(session, dto);
    await this.store.save(session);

    return { ...turn, session: toTutoringSessionView(session) };
  }

  async answerQuestion(
    user: AuthUser,
    id: string,
    dto: AnswerQuestionDto
  ): Promise<QuizAnswerResponse> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'quiz');

    const outcome = this.quizService.answer(session, dto.answerIndex);
    await this.store.save(session);

    return { ...outcome, session: toTutoringSessionView(session) };
  }

  async retakeQuiz(user: AuthUser, id: string): Promise<TutoringSessionView> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'quiz');

    this.quizService.retake(session);
    await this.store.save(session);
    return toTutoringSessionView(session);
  }

  async getQuizResult(user: AuthUser, id: string): Promise<QuizResult> {
    const session = await this.store.get(id, user.ownerKey);
    assertStage(session, 'quiz');
    return this.quizService.getResult(session);
  }

  /**
   * Rebuilds a session from a saved history row. Learn sessions continue
   * where they stopped; quiz sessions start a fresh quiz.
   */
  async resume(
    user: AuthUser,
    userId: number,
    dto: ResumeSessionDto
  ): Promise<TutoringSessionView> {
    const entry = this.learningHistoryService.loadSession({
      userId,
      topic: dto.topic,
      subtopic: dto.subtopic,
      learningLevel: dto.learningLevel,
    });
    if (!entry) {
      throw new NotFoundException('No saved session found');
    }

    const session = await this.store.create({
      ownerKey: user.ownerKey,
      userId,
      topic: entry.topic,
      learningLevel: dto.learningLevel,
      subtopics: [entry.subtopic],
    });
    session.subtopic = entry.subtopic;

    if (dto.mode === 'learn') {
      session.chatHistory = entry.chatHistory;
      session.learningProgress = entry.progress;
    }

    await this.enterMode(session, dto.mode);
    await this.store.save(session);

    this.logger.log(
      `Resumed ${dto.mode} session on "${entry.subtopic}" for user ${userId}`
    );
    return toTutoringSessionView(session);
  }

  private async commitSubtopic(
    session: TutoringSession,
    subtopic: string
  ): Promise<TutoringSessionView> {
    session.subtopic = subtopic;
    await this.store.save(session);
    return toTutoringSessionView(session);
  }

  private async enterMode(
    session: TutoringSession,
    mode: LearningMode
  ): Promise<void> {
    requireSubtopic(session);
    session.mode = mode;

    if (mode === 'learn') {
      session.lessonStartedAt = new Date().toISOString();
      await this.learnService.startLesson(session);
    } else {
      await this.quizService.startQuiz(session);
    }
  }
}
