import { AdaptationStrategy } from '../common/constants/teaching-adaptations';
import {
  AdaptationParams,
  AssessmentParams,
  IAiService,
  LessonParams,
  QuizQuestion,
  TutorReplyParams,
} from './interfaces/ai-service.interface';

/**
 * Injection token for the model provider. Feature services depend on this
 * class; AiModule binds it to a concrete implementation.
 *
 * Every method throws when the model call or the parsing of its output fails.
 */
export abstract class AiService implements IAiService {
  abstract generateSubtopics(
    topic: string,
    learningLevel: string
  ): Promise<string[]>;

  abstract checkSubtopicRelevance(
    subtopic: string,
    topic: string
  ): Promise<boolean>;

  abstract generateLessonIntro(params: LessonParams): Promise<string>;

  abstract chooseAdaptation(
    params: AdaptationParams
  ): Promise<AdaptationStrategy | null>;

  abstract generateTutorReply(params: TutorReplyParams): Promise<string>;

  abstract assessResponse(params: AssessmentParams): Promise<number>;

  abstract generateQuiz(params: LessonParams): Promise<QuizQuestion[]>;
}
