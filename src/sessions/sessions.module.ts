import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InMemorySessionStore } from './in-memory-session.store';
import { RedisSessionStore } from './redis-session.store';
import { SESSION_STORE, SessionStore } from './session.types';
import { SessionBackend } from '../config/env.validation';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export function resolveSessionBackend(config: ConfigService): SessionBackend {
  const configured = config.get<string>('SESSION_BACKEND');
  if (configured === SessionBackend.MEMORY || configured === SessionBackend.REDIS) {
    return configured;
  }
  return config.get<string>('REDIS_URL') ? SessionBackend.REDIS : SessionBackend.MEMORY;
}

@Module({
  providers: [
    {
      provide: SESSION_STORE,
      inject: [ConfigService, LOGGER_SERVICE],
      useFactory: (config: ConfigService, logger: LoggerService): SessionStore => {
        const backend = resolveSessionBackend(config);
        void logger.log(`🗄️ session backend: ${backend}`);

        if (backend === SessionBackend.REDIS) {
          return new RedisSessionStore(
            logger,
            config.get<string>('REDIS_URL') || 'redis://localhost:6379',
            Number(config.get('SESSION_TTL_SECONDS') ?? 86_400),
          );
        }
        return new InMemorySessionStore();
      },
    },
  ],
  exports: [SESSION_STORE],
})
export class SessionsModule {}
