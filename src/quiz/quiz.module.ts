import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { LearningHistoryModule } from '../learning-history/learning-history.module';
import { QuizService } from './quiz.service';

@Module({
  imports: [AiModule, LearningHistoryModule],
  providers: [QuizService],
  exports: [QuizService],
})
export class QuizModule {}
