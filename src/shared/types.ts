export type LogContext = Record<string, unknown>;

export interface LoggerService {
  app: string;
  error(message: string, stack?: string, context?: LogContext): Promise<void>;
  log(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  debug(message: string): Promise<void>;
}

export const LOGGER_SERVICE = 'LOGGER_SERVICE';
