import { Pool } from 'pg';
import { AuditRowRepository, AuditRowInput } from './audit-row.repository';

describe('AuditRowRepository', () => {
  const row: AuditRowInput = {
    userId: '42',
    documentType: 'nda',
    fields: { НАЗВАНИЕ_СТОРОНЫ_1: 'ООО «Ромашка»' },
    mode: 'smart',
    createdAt: '2025-03-14T09:12:00.000Z',
  };

  it('should insert the fields as JSON', async () => {
    const pool = new Pool();
    const query = jest.fn().mockResolvedValue({ rows: [] });
    pool.query = query;

    await new AuditRowRepository(pool).insert(row);

    expect(query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO audit_rows'), [
      '42',
      'nda',
      '{"НАЗВАНИЕ_СТОРОНЫ_1":"ООО «Ромашка»"}',
      'smart',
      '2025-03-14T09:12:00.000Z',
    ]);
  });

  it('should refuse to write without a pool', async () => {
    await expect(new AuditRowRepository(null).insert(row)).rejects.toThrow(
      'Postgres audit sink selected but PG_HOST is not configured',
    );
  });
});
