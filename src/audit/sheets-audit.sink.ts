import { google, sheets_v4 } from 'googleapis';
import { AuditRecord, AuditSink, toAuditRow } from './audit.types';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

export function parseServiceAccount(json: string): ServiceAccountCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error('GOOGLE_CREDS_JSON is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new Error('GOOGLE_CREDS_JSON must be a service account object');
  }
  const { client_email, private_key } = parsed;
  if (typeof client_email !== 'string' || typeof private_key !== 'string') {
    throw new Error('GOOGLE_CREDS_JSON needs client_email and private_key');
  }
  return { client_email, private_key };
}

export class SheetsAuditSink implements AuditSink {
  readonly name = 'sheets';
  private readonly sheets: sheets_v4.Sheets;

  constructor(
    credentialsJson: string,
    private readonly spreadsheetId: string,
    private readonly range: string,
  ) {
    const auth = new google.auth.GoogleAuth({
      credentials: parseServiceAccount(credentialsJson),
      scopes: [SHEETS_SCOPE],
    });
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async append(record: AuditRecord): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: this.range,
      valueInputOption: 'USER_ENTERED',
      requestBody: { values: [toAuditRow(record)] },
    });
  }
}
