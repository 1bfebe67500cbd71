// src/ai/ai.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OpenAI } from 'openai';
import { AiService } from './ai.service';
import { AiUsageService } from './ai-usage.service';
import { RetryPolicy } from './retry-policy';
import { PgModule } from '../pg/pg.module';

@Module({
  imports: [PgModule],
  providers: [
    {
      provide: OpenAI,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new OpenAI({
          apiKey: config.getOrThrow<string>('OPENAI_API_KEY'),
          baseURL: config.get<string>('OPENAI_BASE_URL') || undefined,
        }),
    },
    {
      provide: RetryPolicy,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new RetryPolicy({
          maxAttempts: Number(config.get('GENERATION_MAX_ATTEMPTS') ?? 1),
          baseDelayMs: Number(config.get('GENERATION_RETRY_BASE_MS') ?? 800),
          maxDelayMs: Number(config.get('GENERATION_RETRY_MAX_MS') ?? 10_000),
        }),
    },
    AiService,
    AiUsageService,
  ],
  exports: [AiService, AiUsageService],
})
export class AiModule {}
