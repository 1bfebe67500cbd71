import winston, { createLogger, transports } from 'winston';
import LokiTransport from 'winston-loki';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { LogContext, LoggerService } from '../../types';

const SENSITIVE_KEYS = ['token', 'apikey', 'api_key', 'password', 'authorization', 'bot_token'];

// placeholder names whose values identify a person
const PERSONAL_FIELD = /ПАСПОРТ|PASSPORT|(^|_)(ИНН|INN|СНИЛС)(_|$)|ТЕЛЕФОН|PHONE|E_?MAIL|СЧ[ЕЁ]Т/i;

@Injectable()
export class LokiLoggerService implements LoggerService {
  private readonly logger: winston.Logger;

  public constructor(
    @Inject('JOB_NAME') private readonly job: string,
    @Inject('APP_NAME') private readonly appName: string,
    @Inject('LOKI_HOST') private readonly lokiHost: string | null,
  ) {
    this.logger = this.createLogger(job, appName);
  }

  public get app(): string {
    return this.appName;
  }

  public async log(message: string): Promise<void> {
    this.logger.info(`ℹ️ [LOG] ${message}`);
  }

  public async warn(message: string): Promise<void> {
    this.logger.warn(`⚠️ [WARN] ${message}`);
  }

  public async debug(message: string): Promise<void> {
    if (process.env['NODE_ENV'] !== 'production')
      this.logger.debug(`🐛 [DEBUG] ${message}`);
  }

  public async error(
    message: string,
    stack?: string,
    context?: LogContext,
  ): Promise<void> {
    const logObject = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message: `❌ [ERROR] ${message}`,
      stack: stack ? this.cleanStackTrace(stack) : undefined,
      context: context ? this.redactContext(context) : undefined,
    };

    try {
      this.logger.error(JSON.stringify(logObject));
    } catch (err) {
      Logger.log('Failed to log error:', err);
      throw err;
    }
  }

  private createLogger(job: string, app: string): winston.Logger {
    return createLogger({
      level: 'debug',
      format: winston.format.json(),
      transports: this.initializeTransports(job, app),
    });
  }

  private initializeTransports(job: string, app: string): winston.transport[] {
    const transportsArray: winston.transport[] = [];

    if (this.lokiHost) {
      transportsArray.push(this.createLokiTransport(this.lokiHost, job, app));
    }

    // without Loki the console is the only place logs can go
    if (!this.lokiHost || this.isDevelopmentEnvironment()) {
      transportsArray.push(this.createConsoleTransport());
    }

    return transportsArray;
  }

  private createLokiTransport(host: string, job: string, app: string): LokiTransport {
    return new LokiTransport({
      host,
      labels: { job, app },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) =>
        console.error('Loki connection error:', err),
    });
  }

  private createConsoleTransport(): winston.transport {
    return new transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple(),
      ),
    });
  }

  private isDevelopmentEnvironment(): boolean {
    return ['dev', 'development'].includes(process.env['NODE_ENV'] || '');
  }

  private cleanStackTrace(stack: string, maxDepth: number = 4): string {
    if (!stack) return '';

    const stackLines = stack
      .trim()
      .split('\n')
      .map((line) => line.trim())
      .filter(
        (line) =>
          line.startsWith('Error') || !line.includes('node:internal'),
      )
      .map((line) => {
        if (line.startsWith('at')) {
          const match = line.match(/\((.+)\)/);
          if (match) {
            const path = match[1];
            const simplifiedPath = path.includes('node_modules/')
              ? path.slice(path.lastIndexOf('node_modules/') + 'node_modules/'.length)
              : path.split('/').slice(-3).join('/');
            return `(${simplifiedPath})`;
          }
        }
        return line;
      });

    return stackLines.slice(0, maxDepth).join('\n    ');
  }

  private redactContext(context: LogContext): LogContext {
    return Object.fromEntries(
      Object.entries(context).map(([k, v]) => [k, this.redactValue(k, v)]),
    );
  }

  private redactValue(key: string, value: unknown): unknown {
    if (SENSITIVE_KEYS.includes(key.toLowerCase()) || PERSONAL_FIELD.test(key)) {
      return '*****';
    }
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      return this.redactContext(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }
}
