import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Pool } from 'pg';

export interface AiUsageLogInput {
  kind: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd?: number | null;
  extra?: Record<string, unknown>;
}

@Injectable()
export class AiUsageRepository {
  private readonly logger = new Logger(AiUsageRepository.name);

  constructor(
    @Optional()
    @Inject('PG_POOL')
    private readonly pool: Pool | null,
  ) {}

  /** Returns false when no pool is configured or the insert failed. */
  async create(data: AiUsageLogInput): Promise<boolean> {
    if (!this.pool) return false;

    try {
      await this.pool.query(
        `INSERT INTO ai_usage_logs
           (kind, model, input_tokens, output_tokens, total_tokens, cost_usd, extra, created_at)
         VALUES ($1,   $2,    $3,           $4,            $5,            $6,       $7,    NOW())`,
        [
          data.kind,
          data.model,
          data.inputTokens,
          data.outputTokens,
          data.totalTokens,
          data.costUsd ?? null,
          data.extra ? JSON.stringify(data.extra) : null,
        ],
      );
      return true;
    } catch (e) {
      this.logger.warn(
        `Failed to insert AI usage log: ${e instanceof Error ? e.message : String(e)}`,
      );
      return false;
    }
  }
}
