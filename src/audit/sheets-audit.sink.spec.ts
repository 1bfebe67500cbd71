import { google } from 'googleapis';
import { parseServiceAccount, SheetsAuditSink } from './sheets-audit.sink';

const mockAppend = jest.fn();

jest.mock('googleapis', () => ({
  google: {
    auth: { GoogleAuth: jest.fn().mockImplementation(() => ({})) },
    sheets: jest.fn(() => ({ spreadsheets: { values: { append: mockAppend } } })),
  },
}));

describe('SheetsAuditSink', () => {
  const creds = JSON.stringify({
    client_email: 'bot@test-project.iam.gserviceaccount.com',
    private_key: 'test-secret',
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should authenticate with the service account and append one row', async () => {
    mockAppend.mockResolvedValueOnce({ data: {} });
    const sink = new SheetsAuditSink(creds, 'sheet-id', 'Sheet1!A1');

    await sink.append({
      userId: '42',
      documentType: 'nda',
      fields: { СРОК_ДЕЙСТВИЯ: '3 года' },
      mode: 'auto',
      createdAt: '2025-03-14T09:12:00.000Z',
    });

    expect(google.auth.GoogleAuth).toHaveBeenCalledWith({
      credentials: {
        client_email: 'bot@test-project.iam.gserviceaccount.com',
        private_key: 'test-secret',
      },
      scopes: ['https://www.googleapis.com/auth/spreadsheets'],
    });
    expect(mockAppend).toHaveBeenCalledWith({
      spreadsheetId: 'sheet-id',
      range: 'Sheet1!A1',
      valueInputOption: 'USER_ENTERED',
      requestBody: { values: [['42', 'nda', '3 года', 'auto']] },
    });
  });

  it('should reject credentials that are not JSON', () => {
    expect(() => parseServiceAccount('not json')).toThrow('GOOGLE_CREDS_JSON is not valid JSON');
  });

  it('should reject credentials without a private key', () => {
    expect(() => parseServiceAccount('{"client_email": "a@b.c"}')).toThrow(
      'GOOGLE_CREDS_JSON needs client_email and private_key',
    );
  });
});
