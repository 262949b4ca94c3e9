import { Module } from '@nestjs/common';
import { LearningHistoryController } from './learning-history.controller';
import { LearningHistoryService } from './learning-history.service';

@Module({
  controllers: [LearningHistoryController],
  providers: [LearningHistoryService],
  exports: [LearningHistoryService],
})
export class LearningHistoryModule {}
