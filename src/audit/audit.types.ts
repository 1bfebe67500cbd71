import type { AuditRowInput } from '../pg/audit-row.repository';

export type AuditRecord = AuditRowInput;

export const AUDIT_SINK = 'AUDIT_SINK';

export interface AuditSink {
  readonly name: string;
  append(record: AuditRecord): Promise<void>;
}

/** Sheet row layout: user, document type, field values in fill order, mode. */
export function toAuditRow(record: AuditRecord): string[] {
  return [record.userId, record.documentType, ...Object.values(record.fields), record.mode];
}
