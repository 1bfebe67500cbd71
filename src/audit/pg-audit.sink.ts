import { AuditRowRepository } from '../pg/audit-row.repository';
import { AuditRecord, AuditSink } from './audit.types';

export class PgAuditSink implements AuditSink {
  readonly name = 'pg';

  constructor(private readonly repository: AuditRowRepository) {}

  async append(record: AuditRecord): Promise<void> {
    await this.repository.insert(record);
  }
}
