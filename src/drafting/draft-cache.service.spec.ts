import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DraftCacheService } from './draft-cache.service';
import type { LoggerService } from '../shared/types';

describe('DraftCacheService', () => {
  let dir: string;
  let logger: jest.Mocked<LoggerService>;

  const createCache = (enabled = true) =>
    new DraftCacheService(
      new ConfigService({ DRAFT_CACHE_DIR: dir, DRAFT_CACHE_ENABLED: enabled }),
      logger,
    );

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'draft-cache-'));
    logger = {
      app: 'test-app',
      log: jest.fn().mockResolvedValue(undefined),
      warn: jest.fn().mockResolvedValue(undefined),
      debug: jest.fn().mockResolvedValue(undefined),
      error: jest.fn().mockResolvedValue(undefined),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should key entries by the sha256 of the trimmed, lower-cased prompt', () => {
    const cache = createCache();

    expect(cache.keyFor('  Договор АРЕНДЫ ')).toBe(cache.keyFor('договор аренды'));
    expect(cache.keyFor('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
    expect(cache.pathFor('abc')).toBe(
      path.join(dir, 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad.json'),
    );
  });

  it('should return null on a miss', async () => {
    await expect(createCache().load('never stored')).resolves.toBeNull();
  });

  it('should return a saved draft for the same normalized prompt', async () => {
    const cache = createCache();
    await cache.save('Договор аренды', 'ТЕКСТ ДОГОВОРА');

    await expect(cache.load('  договор аренды')).resolves.toBe('ТЕКСТ ДОГОВОРА');

    const stored = JSON.parse(await readFile(cache.pathFor('Договор аренды'), 'utf-8'));
    expect(stored).toMatchObject({ prompt: 'Договор аренды', text: 'ТЕКСТ ДОГОВОРА' });
  });

  it('should ignore a corrupted entry with a warning', async () => {
    const cache = createCache();
    await writeFile(cache.pathFor('broken'), '{not json', 'utf-8');

    await expect(cache.load('broken')).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should neither read nor write when disabled', async () => {
    const cache = createCache(false);
    await cache.save('Договор аренды', 'ТЕКСТ');

    await expect(readFile(cache.pathFor('Договор аренды'), 'utf-8')).rejects.toThrow();
    await expect(cache.load('Договор аренды')).resolves.toBeNull();
  });
});
