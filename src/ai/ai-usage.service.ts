// src/ai/ai-usage.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { AiUsageRepository, AiUsageLogInput } from '../pg/ai-usage.repository';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export interface ChatCompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

/**
 * Rough pricing table, USD per 1M tokens. Update when OpenAI prices change.
 */
const PRICING_PER_1M: Record<string, { input: number; output: number }> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
};

const DEFAULT_PRICING = { input: 0.15, output: 0.6 };

@Injectable()
export class AiUsageService {
  constructor(
    private readonly repo: AiUsageRepository,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  computeCostUsd(
    model: string,
    inputTokens: number,
    outputTokens: number,
  ): number | null {
    const p = PRICING_PER_1M[model] ?? DEFAULT_PRICING;

    const inputCost = (inputTokens / 1_000_000) * p.input;
    const outputCost = (outputTokens / 1_000_000) * p.output;

    const total = inputCost + outputCost;
    if (!isFinite(total) || total === 0) return null;
    return Number(total.toFixed(6));
  }

  async recordCompletion(
    kind: string,
    model: string,
    usage: ChatCompletionUsage | undefined,
    extra?: Record<string, unknown>,
  ): Promise<void> {
    if (!usage) return;

    const inputTokens = usage.prompt_tokens ?? 0;
    const outputTokens = usage.completion_tokens ?? 0;

    await this.record({
      kind,
      model,
      inputTokens,
      outputTokens,
      totalTokens: usage.total_tokens ?? inputTokens + outputTokens,
      costUsd: this.computeCostUsd(model, inputTokens, outputTokens),
      extra,
    });
  }

  async record(input: AiUsageLogInput): Promise<void> {
    const stored = await this.repo.create(input);
    if (!stored) {
      await this.logger.debug(
        `ai usage kind=${input.kind} model=${input.model} tokens=${input.totalTokens} costUsd=${input.costUsd ?? 'n/a'}`,
      );
    }
  }
}
