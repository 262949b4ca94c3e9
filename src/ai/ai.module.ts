import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AiService } from './ai.service';
import { GeminiAiService } from './gemini-ai.service';

@Module({
  imports: [ConfigModule],
  providers: [
    GeminiAiService,
    {
      provide: AiService,
      useExisting: GeminiAiService,
    },
  ],
  exports: [AiService],
})
export class AiModule {}
