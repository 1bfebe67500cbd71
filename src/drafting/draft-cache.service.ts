import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

interface CachedDraft {
  prompt: string;
  text: string;
  createdAt: string;
}

/**
 * File cache of drafts keyed by sha256 of the normalized drafting prompt.
 */
@Injectable()
export class DraftCacheService {
  private readonly dir: string;
  private readonly enabled: boolean;

  constructor(
    config: ConfigService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {
    this.dir = config.get<string>('DRAFT_CACHE_DIR') || 'cache';
    this.enabled = config.get('DRAFT_CACHE_ENABLED') !== false;
  }

  static normalize(prompt: string): string {
    return prompt.trim().toLowerCase();
  }

  keyFor(prompt: string): string {
    return createHash('sha256').update(DraftCacheService.normalize(prompt)).digest('hex');
  }

  pathFor(prompt: string): string {
    return path.join(this.dir, `${this.keyFor(prompt)}.json`);
  }

  async load(prompt: string): Promise<string | null> {
    if (!this.enabled) return null;

    let raw: string;
    try {
      raw = await readFile(this.pathFor(prompt), 'utf-8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
      await this.logger.warn(
        `Draft cache read failed for ${this.keyFor(prompt)}: ${e instanceof Error ? e.message : String(e)}`,
      );
      return null;
    }

    try {
      const parsed: Partial<CachedDraft> = JSON.parse(raw);
      return typeof parsed.text === 'string' && parsed.text ? parsed.text : null;
    } catch {
      await this.logger.warn(`Draft cache entry ${this.keyFor(prompt)} is not valid JSON, ignoring it`);
      return null;
    }
  }

  async save(prompt: string, text: string): Promise<void> {
    if (!this.enabled) return;

    const entry: CachedDraft = { prompt, text, createdAt: new Date().toISOString() };
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.pathFor(prompt), JSON.stringify(entry), 'utf-8');
    } catch (e) {
      await this.logger.warn(`Failed to write draft cache: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
}
