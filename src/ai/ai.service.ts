// src/ai/ai.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  OpenAI,
} from 'openai';
import { AiUsageService } from './ai-usage.service';
import { RetryPolicy } from './retry-policy';
import { GenerationAbortedError, GenerationError } from './generation.error';
import {
  GENERATION_PROFILES,
  GenerationFailureKind,
  GenerationOptions,
} from './ai.types';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Thin chat-completion client. One request per attempt, fixed parameters per
 * call kind; every failure surfaces as GenerationError.
 */
@Injectable()
export class AiService {
  private readonly model: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
    private readonly retryPolicy: RetryPolicy,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
    config: ConfigService,
  ) {
    this.model = config.get<string>('OPENAI_MODEL') || DEFAULT_MODEL;
    this.timeoutMs = Number(config.get('GENERATION_TIMEOUT_MS') ?? 60_000);
  }

  async generate(
    systemPrompt: string,
    userPrompt: string,
    options: GenerationOptions = {},
  ): Promise<string> {
    const kind = options.kind ?? 'draft';
    const profile = GENERATION_PROFILES[kind];
    const signal = options.signal;
    let attempts = 0;

    try {
      return await this.retryPolicy.execute(
        async (attempt) => {
          attempts = attempt;

          const res = await this.openai.chat.completions.create(
            {
              model: this.model,
              messages: [
                { role: 'system', content: systemPrompt },
                { role: 'user', content: userPrompt },
              ],
              temperature: profile.temperature,
              max_tokens: profile.maxTokens,
              response_format: profile.jsonMode ? { type: 'json_object' } : undefined,
            },
            { signal, timeout: this.timeoutMs, maxRetries: 0 },
          );

          // 🔢 metering
          await this.aiUsage.recordCompletion(kind, this.model, res.usage, {
            promptPreview: userPrompt.slice(0, 200),
            attempt,
          });

          const content = res.choices?.[0]?.message?.content?.trim();
          if (!content) {
            throw new GenerationError(
              `Empty completion from model for "${kind}"`,
              'empty',
              attempt,
            );
          }

          return content;
        },
        {
          signal,
          isRetryable: (error) => this.isRetryable(error),
          onRetry: (error, attempt, delayMs) => {
            void this.logger.warn(
              `generate(${kind}) attempt ${attempt} failed (${this.describe(error)}), retrying in ${delayMs}ms`,
            );
          },
        },
      );
    } catch (error: unknown) {
      if (signal?.aborted || error instanceof APIUserAbortError) {
        await this.logger.debug(`generate(${kind}) aborted after ${attempts} attempt(s)`);
        throw new GenerationAbortedError(kind);
      }

      const failure =
        error instanceof GenerationError ? error.failure : this.classify(error);

      await this.logger.error(
        `Error while calling OpenAI (${kind}): ${this.describe(error)}`,
        error instanceof Error ? error.stack : undefined,
        { kind, failure, attempts, model: this.model },
      );

      throw new GenerationError(
        `Generation call "${kind}" failed after ${attempts} attempt(s): ${this.describe(error)}`,
        failure,
        attempts,
        { cause: error },
      );
    }
  }

  classify(error: unknown): GenerationFailureKind {
    if (error instanceof GenerationError) return error.failure;
    if (error instanceof APIConnectionTimeoutError) return 'timeout';
    if (error instanceof APIError) {
      if (error.status === 429) return 'rate_limit';
      if (error.status === undefined) return 'network';
      return 'api';
    }
    return 'network';
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIUserAbortError) return false;
    if (error instanceof APIError && typeof error.status === 'number') {
      return error.status === 429 || error.status >= 500;
    }
    // empty completions, timeouts, dropped connections
    return true;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
