// src/pg/pg.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';

import { AiUsageRepository } from './ai-usage.repository';
import { AuditRowRepository } from './audit-row.repository';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export const PG_POOL = 'PG_POOL';

@Module({
  providers: [
    {
      provide: PG_POOL,
      inject: [ConfigService, LOGGER_SERVICE],
      useFactory: (config: ConfigService, logger: LoggerService): Pool | null => {
        const host = config.get<string>('PG_HOST');
        if (!host) {
          void logger.log('[PG] PG_HOST not set, Postgres-backed usage and audit logs are disabled');
          return null;
        }

        const pool = new Pool({
          host,
          port: +(config.get<string>('PG_PORT') || 5432),
          database: config.get<string>('PG_DB') || 'contract_bot',
          user: config.get<string>('PG_USER') || 'postgres',
          password: config.get<string>('PG_PASS'),
          max: Number(config.get('PG_POOL_MAX') ?? 5),
          idleTimeoutMillis: 30_000,
          connectionTimeoutMillis: 5_000,
        });

        void logger.log(`[PG] pool created host="${host}" pid=${process.pid}`);

        pool.on('error', (err: Error) => {
          void logger.error(`[PG] pool error: ${err.message}`, err.stack);
        });

        return pool;
      },
    },
    AiUsageRepository,
    AuditRowRepository,
  ],
  exports: [PG_POOL, AiUsageRepository, AuditRowRepository],
})
export class PgModule {}
