import { IncomingMessage } from 'node:http';
import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AiModule } from './ai/ai.module';
import { AuthModule } from './auth/auth.module';
import { CacheModule } from './cache/cache.module';
import aiConfig from './config/ai.config';
import authConfig from './config/auth.config';
import databaseConfig from './config/database.config';
import tutoringConfig from './config/tutoring.config';
import { DatabaseModule } from './database/database.module';
import { LearnModule } from './learn/learn.module';
import { LearningHistoryModule } from './learning-history/learning-history.module';
import { QuizModule } from './quiz/quiz.module';
import { TopicModule } from './topic/topic.module';
import { TutoringModule } from './tutoring/tutoring.module';
import { UserModule } from './user/user.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [aiConfig, authConfig, databaseConfig, tutoringConfig],
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000,
        limit: 100,
      },
    ]),
    LoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('LOG_LEVEL', 'info'),
          serializers: {
            req: (req: {
              id: unknown;
              method: string;
              url: string;
              query: unknown;
              params: unknown;
            }) => ({
              id: req.id,
              method: req.method,
              url: req.url,
              query: req.query,
              params: req.params,
            }),
          },
          customProps: (req: IncomingMessage) => ({
            payload: 'body' in req ? req.body : undefined,
          }),
          transport:
            configService.get('NODE_ENV') !== 'production'
              ? {
                  target: 'pino-pretty',
                  options: {
                    singleLine: true,
                  },
                }
              : undefined,
          redact: {
            paths: [
              'payload.password',
              'payload.confirmPassword',
              'payload.accessToken',
              'req.headers.authorization',
              'req.headers.cookie',
            ],
            remove: true,
          },
        },
      }),
    }),
    DatabaseModule,
    CacheModule,
    AiModule,
    AuthModule,
    UserModule,
    LearningHistoryModule,
    TopicModule,
    LearnModule,
    QuizModule,
    TutoringModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
