import { Module } from '@nestjs/common';
import { AiModule } from '../ai/ai.module';
import { TopicService } from './topic.service';

@Module({
  imports: [AiModule],
  providers: [TopicService],
  exports: [TopicService],
})
export class TopicModule {}
