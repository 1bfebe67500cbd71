import { LokiLoggerService } from './loki-logger.service';
import winston from 'winston';
import LokiTransport from 'winston-loki';

jest.mock('winston', () => ({
  createLogger: jest.fn().mockReturnValue({
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  }),
  transports: {
    Console: jest.fn(),
  },
  format: {
    combine: jest.fn((...args: unknown[]) => args),
    colorize: jest.fn(() => ({ mock: 'colorize' })),
    simple: jest.fn(() => ({ mock: 'simple' })),
    json: jest.fn(() => ({ mock: 'json' })),
  },
}));

jest.mock('winston-loki', () => {
  return jest.fn().mockImplementation(() => ({}));
});

describe('LokiLoggerService', () => {
  let loggerService: LokiLoggerService;
  const fixedTimestamp = '2025-03-14T09:12:00.000Z';

  const mockStack =
    'Error: Test error\n    at Object.<anonymous> (test.js:10:15)';

  beforeEach(() => {
    jest.spyOn(Date.prototype, 'toISOString').mockReturnValue(fixedTimestamp);
    loggerService = new LokiLoggerService('test-job', 'test-app', null);
  });

  afterEach(() => {
    jest.clearAllMocks();
    delete process.env['NODE_ENV'];
  });

  it('should expose the app name', () => {
    expect(loggerService.app).toBe('test-app');
  });

  it('should log an info message', async () => {
    await loggerService.log('Test info message');
    expect(loggerService['logger'].info).toHaveBeenCalledWith('ℹ️ [LOG] Test info message');
  });

  it('should log a warning message', async () => {
    await loggerService.warn('Test warning message');
    expect(loggerService['logger'].warn).toHaveBeenCalledWith('⚠️ [WARN] Test warning message');
  });

  it('should log a debug message outside production', async () => {
    await loggerService.debug('Test debug message');
    expect(loggerService['logger'].debug).toHaveBeenCalledWith('🐛 [DEBUG] Test debug message');
  });

  it('should drop debug messages in production', async () => {
    process.env['NODE_ENV'] = 'production';
    await loggerService.debug('Test debug message');
    expect(loggerService['logger'].debug).not.toHaveBeenCalled();
  });

  it('should log an error with a cleaned stack and redacted context', async () => {
    await loggerService.error('Generation failed', mockStack, {
      userId: '42',
      token: 'test-secret',
    });

    expect(loggerService['logger'].error).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: fixedTimestamp,
        level: 'error',
        message: '❌ [ERROR] Generation failed',
        stack: 'Error: Test error\n    (test.js:10:15)',
        context: { userId: '42', token: '*****' },
      }),
    );
  });

  it('should mask personal fields inside nested context', async () => {
    await loggerService.error('Audit append failed', undefined, {
      userId: '42',
      fields: { ПАСПОРТ_АРЕНДАТОРА: '4510 123456', ИНН_АРЕНДОДАТЕЛЯ: '7707083893', АРЕНДНАЯ_ПЛАТА: '50 000' },
    });

    expect(loggerService['logger'].error).toHaveBeenCalledWith(
      JSON.stringify({
        timestamp: fixedTimestamp,
        level: 'error',
        message: '❌ [ERROR] Audit append failed',
        context: {
          userId: '42',
          fields: { ПАСПОРТ_АРЕНДАТОРА: '*****', ИНН_АРЕНДОДАТЕЛЯ: '*****', АРЕНДНАЯ_ПЛАТА: '50 000' },
        },
      }),
    );
  });

  it('should clean stack traces by shortening paths and dropping node internals', () => {
    const rawStack = `
      Error: Test error
          at Object.<anonymous> (/home/bot/project/node_modules/some-package/index.js:10:15)
          at Object.<anonymous> (/home/bot/project/src/test.js:5:10)
          at Module._compile (node:internal/modules/cjs/loader:1358:14)
          at Module.load (node:internal/modules/cjs/loader:1208:32)
    `;
    const cleanedStack = loggerService['cleanStackTrace'](rawStack);
    expect(cleanedStack).toBe(
      'Error: Test error\n    (some-package/index.js:10:15)\n    (project/src/test.js:5:10)',
    );
  });

  it('should use only the console transport when no Loki host is configured', () => {
    expect(winston.transports.Console).toHaveBeenCalledTimes(1);
    expect(LokiTransport).not.toHaveBeenCalled();
  });

  it('should add a Loki transport labelled with job and app when a host is configured', () => {
    jest.clearAllMocks();

    new LokiLoggerService('test-job', 'test-app', 'http://loki.test:3100');

    expect(LokiTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'http://loki.test:3100',
        labels: { job: 'test-job', app: 'test-app' },
      }),
    );
    expect(winston.transports.Console).not.toHaveBeenCalled();
  });

  it('should keep the console transport next to Loki in development', () => {
    jest.clearAllMocks();
    process.env['NODE_ENV'] = 'dev';

    new LokiLoggerService('test-job', 'test-app', 'http://loki.test:3100');

    expect(winston.transports.Console).toHaveBeenCalledWith(
      expect.objectContaining({
        format: expect.anything(),
      }),
    );
  });
});
