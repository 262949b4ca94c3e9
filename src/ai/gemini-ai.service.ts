import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenerativeAI } from '@google/generative-ai';
import {
  AdaptationStrategy,
  matchAdaptationStrategy,
} from '../common/constants/teaching-adaptations';
import { getErrorMessage, getErrorStack } from '../common/utils/error.utils';
import { AiPrompts } from './ai.prompts';
import { AiService } from './ai.service';
import {
  parseAssessmentScore,
  parseQuizQuestions,
  parseRelevanceVerdict,
  parseSubtopics,
} from './ai-response.parsers';
import {
  AdaptationParams,
  AssessmentParams,
  LessonParams,
  QuizQuestion,
  TutorReplyParams,
} from './interfaces/ai-service.interface';

type TaskType =
  | 'subtopics'
  | 'relevance'
  | 'lesson'
  | 'adaptation'
  | 'reply'
  | 'assessment'
  | 'quiz';

/** Tasks whose prompt asks for JSON, so the model is told to emit it */
const JSON_TASKS: ReadonlySet<TaskType> = new Set(['subtopics', 'quiz']);

@Injectable()
export class GeminiAiService extends AiService {
  private readonly logger = new Logger(GeminiAiService.name);
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;
  private readonly temperature: number;

  constructor(private readonly configService: ConfigService) {
    super();

    const apiKey = this.configService.get<string>('ai.apiKey');
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is not configured');
    }

    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = this.configService.get<string>(
      'ai.model',
      'gemini-2.0-flash'
    );
    this.temperature = this.configService.get<number>('ai.temperature', 0.7);

    this.logger.log(`Initialized Gemini provider with model ${this.modelName}`);
  }

  async generateSubtopics(
    topic: string,
    learningLevel: string
  ): Promise<string[]> {
    const text = await this.generate(
      AiPrompts.generateSubtopics(topic, learningLevel),
      'subtopics'
    );
    return parseSubtopics(text);
  }

  async checkSubtopicRelevance(
    subtopic: string,
    topic: string
  ): Promise<boolean> {
    const text = await this.generate(
      AiPrompts.checkSubtopicRelevance(subtopic, topic),
      'relevance'
    );
    return parseRelevanceVerdict(text);
  }

  async generateLessonIntro({
    subtopic,
    topic,
    learningLevel,
  }: LessonParams): Promise<string> {
    const text = await this.generate(
      AiPrompts.generateLessonIntro(subtopic, topic, learningLevel),
      'lesson'
    );
    return this.requireText(text, 'lesson');
  }

  async chooseAdaptation({
    userInput,
    progress,
    learningLevel,
  }: AdaptationParams): Promise<AdaptationStrategy | null> {
    const text = await this.generate(
      AiPrompts.chooseAdaptation(userInput, progress, learningLevel),
      'adaptation'
    );

    const strategy = matchAdaptationStrategy(text);
    if (!strategy) {
      this.logger.debug(`Unrecognised adaptation strategy: ${text.trim()}`);
    }
    return strategy;
  }

  async generateTutorReply(params: TutorReplyParams): Promise<string> {
    const text = await this.generate(
      AiPrompts.generateTutorReply(params),
      'reply'
    );
    return this.requireText(text, 'reply');
  }

  async assessResponse({
    userInput,
    previousTeacherMessage,
    subtopic,
    learningLevel,
  }: AssessmentParams): Promise<number> {
    const text = await this.generate(
      AiPrompts.assessResponse(
        userInput,
        previousTeacherMessage,
        subtopic,
        learningLevel
      ),
      'assessment'
    );
    return parseAssessmentScore(text);
  }

  async generateQuiz({
    subtopic,
    topic,
    learningLevel,
  }: LessonParams): Promise<QuizQuestion[]> {
    const text = await this.generate(
      AiPrompts.generateQuiz(subtopic, topic, learningLevel),
      'quiz'
    );

    const { questions, discarded } = parseQuizQuestions(text);
    if (discarded > 0) {
      this.logger.warn(`Filtered out ${discarded} invalid question(s)`);
    }
    return questions;
  }

  private async generate(prompt: string, taskType: TaskType): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.modelName,
      generationConfig: {
        temperature: this.temperature,
        ...(JSON_TASKS.has(taskType)
          ? { responseMimeType: 'application/json' }
          : {}),
      },
    });

    try {
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      this.logger.error(
        `Gemini API call failed for task type "${taskType}":`,
        getErrorStack(error)
      );
      throw new Error(`AI generation failed: ${getErrorMessage(error)}`);
    }
  }

  private requireText(text: string, taskType: TaskType): string {
    const trimmed = text.trim();
    if (!trimmed) {
      throw new Error(`Empty ${taskType} response from model`);
    }
    return trimmed;
  }
}
