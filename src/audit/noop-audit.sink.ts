import { AuditSink } from './audit.types';

export class NoopAuditSink implements AuditSink {
  readonly name = 'none';

  async append(): Promise<void> {
    // audit disabled
  }
}
