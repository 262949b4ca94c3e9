import { Module } from '@nestjs/common';
import { LearnModule } from '../learn/learn.module';
import { LearningHistoryModule } from '../learning-history/learning-history.module';
import { QuizModule } from '../quiz/quiz.module';
import { TopicModule } from '../topic/topic.module';
import { TutoringController } from './tutoring.controller';
import { TutoringSessionStore } from './tutoring-session.store';
import { TutoringService } from './tutoring.service';

@Module({
  imports: [TopicModule, LearnModule, QuizModule, LearningHistoryModule],
  controllers: [TutoringController],
  providers: [TutoringService, TutoringSessionStore],
  exports: [TutoringSessionStore],
})
export class TutoringModule {}
