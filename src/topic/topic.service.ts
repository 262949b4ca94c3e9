import { Injectable, Logger } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { getLevelProfile } from '../common/constants/learning-levels';
import { shuffleArray } from '../common/utils/array.utils';
import { getErrorMessage } from '../common/utils/error.utils';

@Injectable()
export class TopicService {
  private readonly logger = new Logger(TopicService.name);

  constructor(private readonly aiService: AiService) {}

  /**
   * Up to five broad subtopics. When generation fails the level's stock list
   * is returned in random order.
   */
  async generateSubtopics(
    topic: string,
    learningLevel: string
  ): Promise<string[]> {
    try {
      return await this.aiService.generateSubtopics(topic, learningLevel);
    } catch (error) {
      this.logger.error(
        `Error generating subtopics for "${topic}": ${getErrorMessage(error)}`
      );
      return shuffleArray(getLevelProfile(learningLevel).fallbackSubtopics);
    }
  }

  /**
   * Assumes the subtopic is related when the check itself fails
   */
  async isRelatedSubtopic(subtopic: string, topic: string): Promise<boolean> {
    try {
      return await this.aiService.checkSubtopicRelevance(subtopic, topic);
    } catch (error) {
      this.logger.warn(
        `Relevance check failed for "${subtopic}" in "${topic}": ${getErrorMessage(error)}`
      );
      return true;
    }
  }
}
