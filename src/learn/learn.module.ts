import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { LearningHistoryModule } from '../learning-history/learning-history.module';
import { LearnService } from './learn.service';

@Module({
  imports: [AiModule, LearningHistoryModule],
  providers: [LearnService],
  exports: [LearnService],
})
export class LearnModule {}
