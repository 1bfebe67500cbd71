import { Inject, Injectable, Optional } from '@nestjs/common';
import { Pool } from 'pg';

export interface AuditRowInput {
  userId: string;
  documentType: string;
  fields: Record<string, string>;
  mode: string;
  createdAt: string;
}

@Injectable()
export class AuditRowRepository {
  constructor(
    @Optional()
    @Inject('PG_POOL')
    private readonly pool: Pool | null,
  ) {}

  async insert(row: AuditRowInput): Promise<void> {
    if (!this.pool) {
      throw new Error('Postgres audit sink selected but PG_HOST is not configured');
    }

    await this.pool.query(
      `INSERT INTO audit_rows (user_id, document_type, fields, mode, created_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [row.userId, row.documentType, JSON.stringify(row.fields), row.mode, row.createdAt],
    );
  }
}
