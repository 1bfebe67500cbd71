import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LokiLoggerService } from './loki-logger.service';
import { LOGGER_SERVICE } from '../../types';

@Global()
@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>('JOB_NAME') || 'contract-bot',
    },
    {
      provide: 'APP_NAME',
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>('APP_NAME') || 'contract-drafting-bot',
    },
    {
      provide: 'LOKI_HOST',
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>('LOKI_HOST') || null,
    },
    LokiLoggerService,
    {
      provide: LOGGER_SERVICE,
      useExisting: LokiLoggerService,
    },
  ],
  exports: [
    LOGGER_SERVICE, // main abstraction
    LokiLoggerService,
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
