import { Inject, Injectable } from '@nestjs/common';
import { AUDIT_SINK, AuditRecord, AuditSink } from './audit.types';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

@Injectable()
export class AuditService {
  constructor(
    @Inject(AUDIT_SINK) private readonly sink: AuditSink,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  /** Never throws; a failed write is logged and dropped. */
  async record(record: AuditRecord): Promise<void> {
    try {
      await this.sink.append(record);
      await this.logger.debug(`📝 audit row written to ${this.sink.name} for user ${record.userId}`);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      await this.logger.error(
        `Audit write to ${this.sink.name} failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
        { userId: record.userId, documentType: record.documentType },
      );
    }
  }
}
