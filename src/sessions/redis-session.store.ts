import Redis from 'ioredis';
import { OnModuleDestroy } from '@nestjs/common';
import type { LoggerService } from '../shared/types';
import { isSession, Session, SessionStore } from './session.types';

export const SESSION_KEY_PREFIX = 'contract-bot:session:';

export class RedisSessionStore implements SessionStore, OnModuleDestroy {
  private readonly redis: Redis;

  constructor(
    private readonly logger: LoggerService,
    redisUrl: string,
    private readonly ttlSeconds: number,
  ) {
    this.redis = new Redis(redisUrl);
    this.redis.on('error', (error: Error) => this.handleError('Redis connection error', error));
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    await this.logger.log('Redis session store closed');
  }

  /**
   * Missing or malformed entries count as "no session"; Redis failures propagate.
   */
  async get(userId: string): Promise<Session | null> {
    const key = this.keyFor(userId);
    let cachedValue: string | null;
    try {
      cachedValue = await this.redis.get(key);
    } catch (error) {
      this.handleError(`Failed to retrieve key "${key}" from Redis`, error);
      throw error;
    }
    if (!cachedValue) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(cachedValue);
    } catch {
      parsed = null;
    }
    if (!isSession(parsed)) {
      await this.logger.warn(`Discarding malformed session under "${key}"`);
      return null;
    }
    return parsed;
  }

  async set(session: Session): Promise<void> {
    const key = this.keyFor(session.userId);
    try {
      await this.redis.set(key, JSON.stringify(session), 'EX', this.ttlSeconds);
      await this.logger.debug(`Set key "${key}" in Redis with TTL: ${this.ttlSeconds} seconds`);
    } catch (error) {
      this.handleError(`Failed to set key "${key}" in Redis`, error);
      throw error;
    }
  }

  async clear(userId: string): Promise<void> {
    const key = this.keyFor(userId);
    try {
      await this.redis.del(key);
    } catch (error) {
      this.handleError(`Failed to delete key "${key}" from Redis`, error);
      throw error;
    }
  }

  private keyFor(userId: string): string {
    return `${SESSION_KEY_PREFIX}${userId}`;
  }

  private handleError(context: string, error: unknown): void {
    if (error instanceof Error) {
      this.logger.error(`${context}: ${error.message}`, error.stack).catch(console.error);
    } else {
      this.logger.error(`${context}: ${String(error)}`).catch(console.error);
    }
  }
}
