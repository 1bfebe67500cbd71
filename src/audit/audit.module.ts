import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PgModule } from '../pg/pg.module';
import { AuditRowRepository } from '../pg/audit-row.repository';
import { AuditSinkKind } from '../config/env.validation';
import { AuditService } from './audit.service';
import { AUDIT_SINK, AuditSink } from './audit.types';
import { NoopAuditSink } from './noop-audit.sink';
import { PgAuditSink } from './pg-audit.sink';
import { SheetsAuditSink } from './sheets-audit.sink';

@Module({
  imports: [PgModule],
  providers: [
    {
      provide: AUDIT_SINK,
      inject: [ConfigService, AuditRowRepository],
      useFactory: (config: ConfigService, repository: AuditRowRepository): AuditSink => {
        switch (config.get<string>('AUDIT_SINK')) {
          case AuditSinkKind.SHEETS:
            return new SheetsAuditSink(
              config.getOrThrow<string>('GOOGLE_CREDS_JSON'),
              config.getOrThrow<string>('AUDIT_SPREADSHEET_ID'),
              config.get<string>('AUDIT_SHEET_RANGE') || 'Sheet1!A1',
            );
          case AuditSinkKind.PG:
            return new PgAuditSink(repository);
          default:
            return new NoopAuditSink();
        }
      },
    },
    AuditService,
  ],
  exports: [AuditService],
})
export class AuditModule {}
