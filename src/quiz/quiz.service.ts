import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
} from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { QuizQuestion } from '../ai/interfaces/ai-service.interface';
import { getErrorMessage } from '../common/utils/error.utils';
import { LearningHistoryService } from '../learning-history/learning-history.service';
import {
  QuizAnswerRecord,
  TutoringSession,
} from '../tutoring/interfaces/tutoring-session.interface';
import {
  isQuizComplete,
  requireSubtopic,
} from '../tutoring/tutoring-session.utils';
import { QuizUtils, QuizVerdict, VERDICT_MESSAGES } from './quiz.utils';

export interface QuizResult {
  score: number;
  total: number;
  percentage: number;
  verdict: QuizVerdict;
  message: string;
  answers: QuizAnswerRecord[];
}

export interface QuizAnswerOutcome {
  isCorrect: boolean;
  correctAnswer: string;
  explanation: string;
  /** 1-based number of the question just answered */
  questionNumber: number;
  completed: boolean;
  /** Set once the last question has been answered */
  result: QuizResult | null;
}

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    private readonly aiService: AiService,
    private readonly learningHistoryService: LearningHistoryService
  ) {}

  async startQuiz(session: TutoringSession): Promise<void> {
    const subtopic = requireSubtopic(session);
    session.quizQuestions = await this.generateQuestions(session, subtopic);
    this.resetProgress(session);
  }

  answer(session: TutoringSession, answerIndex: number): QuizAnswerOutcome {
    if (isQuizComplete(session)) {
      throw new ConflictException('The quiz is already complete');
    }

    const question = this.currentQuestion(session);
    if (
      !Number.isInteger(answerIndex) ||
      answerIndex < 0 ||
      answerIndex >= question.options.length
    ) {
      throw new BadRequestException(
        `Answer index must be between 0 and ${question.options.length - 1}`
      );
    }

    const isCorrect = QuizUtils.isCorrect(question, answerIndex);
    const correctAnswer = question.options[question.correctAnswer] ?? '';
    if (isCorrect) session.quizScore += 1;

    session.quizAnswers.push({
      question: question.question,
      userAnswer: question.options[answerIndex],
      correctAnswer,
      isCorrect,
      explanation: question.explanation,
    });
    session.currentQuestion += 1;

    const completed = isQuizComplete(session);
    if (completed) this.saveResult(session);

    return {
      isCorrect,
      correctAnswer,
      explanation: question.explanation,
      questionNumber: session.currentQuestion,
      completed,
      result: completed ? this.getResult(session) : null,
    };
  }

  /**
   * Same questions, fresh attempt
   */
  retake(session: TutoringSession): void {
    if (session.quizQuestions.length === 0) {
      throw new ConflictException('There is no quiz to retake');
    }
    this.resetProgress(session);
  }

  getResult(session: TutoringSession): QuizResult {
    if (!isQuizComplete(session)) {
      throw new ConflictException('Finish the quiz to see your result');
    }

    const score = session.quizScore;
    const total = session.quizQuestions.length;
    const verdict = QuizUtils.getVerdict(score, total);

    return {
      score,
      total,
      percentage: QuizUtils.calculatePercentage(score, total),
      verdict,
      message: VERDICT_MESSAGES[verdict],
      answers: session.quizAnswers,
    };
  }

  private async generateQuestions(
    session: TutoringSession,
    subtopic: string
  ): Promise<QuizQuestion[]> {
    try {
      return await this.aiService.generateQuiz({
        subtopic,
        topic: session.topic,
        learningLevel: session.learningLevel,
      });
    } catch (error) {
      this.logger.error(
        `Quiz generation failed for "${subtopic}": ${getErrorMessage(error)}`
      );
      return QuizUtils.fallbackQuiz(subtopic);
    }
  }

  private currentQuestion(session: TutoringSession): QuizQuestion {
    const question = session.quizQuestions[session.currentQuestion];
    if (!question) {
      throw new ConflictException('The quiz has not started');
    }
    return question;
  }

  private resetProgress(session: TutoringSession): void {
    session.currentQuestion = 0;
    session.quizScore = 0;
    session.quizAnswers = [];
  }

  private saveResult(session: TutoringSession): void {
    if (session.userId === null) return;

    this.learningHistoryService.saveSession({
      userId: session.userId,
      topic: session.topic,
      subtopic: requireSubtopic(session),
      learningLevel: session.learningLevel,
      mode: 'quiz',
      progress: 0,
      chatHistory: [],
      quizScore: session.quizScore,
      quizTotal: session.quizQuestions.length,
    });
    this.logger.log(
      `Quiz on "${session.subtopic}" finished by user ${session.userId}: ${session.quizScore}/${session.quizQuestions.length}`
    );
  }
}
