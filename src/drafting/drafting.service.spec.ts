import { Test, TestingModule } from '@nestjs/testing';
import { DraftingService } from './drafting.service';
import { DraftCacheService } from './draft-cache.service';
import { AiService } from '../ai/ai.service';
import { LEGAL_STYLE_GUIDE, REVIEW_SYSTEM_PROMPT } from './prompts';
import { LOGGER_SERVICE } from '../shared/types';

describe('DraftingService', () => {
  let service: DraftingService;
  let generate: jest.Mock;
  let cache: { load: jest.Mock; save: jest.Mock; keyFor: jest.Mock };

  beforeEach(async () => {
    generate = jest.fn();
    cache = {
      load: jest.fn().mockResolvedValue(null),
      save: jest.fn().mockResolvedValue(undefined),
      keyFor: jest.fn().mockReturnValue('0123456789abcdef'),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DraftingService,
        { provide: AiService, useValue: { generate } },
        { provide: DraftCacheService, useValue: cache },
        {
          provide: LOGGER_SERVICE,
          useValue: {
            log: jest.fn().mockResolvedValue(undefined),
            debug: jest.fn().mockResolvedValue(undefined),
          },
        },
      ],
    }).compile();

    service = module.get<DraftingService>(DraftingService);
  });

  describe('askClarifyingQuestion', () => {
    it('should return the model question when it contains a question mark', async () => {
      generate.mockResolvedValueOnce('Какой срок аренды?');

      await expect(service.askClarifyingQuestion('Договор аренды', [])).resolves.toBe(
        'Какой срок аренды?',
      );
      expect(generate).toHaveBeenCalledWith(expect.any(String), expect.any(String), {
        kind: 'clarify',
        signal: undefined,
      });
    });

    it('should return null when the model says the request is complete', async () => {
      generate.mockResolvedValueOnce('ГОТОВО');
      await expect(service.askClarifyingQuestion('Договор аренды', [])).resolves.toBeNull();
    });

    it('should return null for a statement without a question', async () => {
      generate.mockResolvedValueOnce('Данных достаточно.');
      await expect(service.askClarifyingQuestion('Договор аренды', [])).resolves.toBeNull();
    });
  });

  describe('draft', () => {
    it('should call the model once and cache the result on a miss', async () => {
      generate.mockResolvedValueOnce('ДОГОВОР АРЕНДЫ [ФИО_АРЕНДАТОРА]');

      const result = await service.draft('Договор аренды', []);

      expect(result).toEqual({ text: 'ДОГОВОР АРЕНДЫ [ФИО_АРЕНДАТОРА]', cached: false });
      expect(generate).toHaveBeenCalledTimes(1);
      expect(generate.mock.calls[0][0]).toBe(LEGAL_STYLE_GUIDE);
      expect(cache.save).toHaveBeenCalledWith(
        expect.stringContaining('Запрос клиента:\nДоговор аренды'),
        'ДОГОВОР АРЕНДЫ [ФИО_АРЕНДАТОРА]',
      );
    });

    it('should skip the model on a cache hit', async () => {
      cache.load.mockResolvedValueOnce('КЭШИРОВАННЫЙ ДОГОВОР');

      const result = await service.draft('Договор аренды', []);

      expect(result).toEqual({ text: 'КЭШИРОВАННЫЙ ДОГОВОР', cached: true });
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe('cachedDraft', () => {
    it('should look up the bare request without calling the model', async () => {
      cache.load.mockResolvedValueOnce('КЭШИРОВАННЫЙ ДОГОВОР');

      await expect(service.cachedDraft('Договор аренды')).resolves.toBe('КЭШИРОВАННЫЙ ДОГОВОР');
      await service.draft('Договор аренды', []);

      expect(cache.load.mock.calls[0][0]).toBe(cache.load.mock.calls[1][0]);
      expect(generate).toHaveBeenCalledTimes(1);
    });

    it('should return null on a miss', async () => {
      await expect(service.cachedDraft('Договор аренды')).resolves.toBeNull();
      expect(generate).not.toHaveBeenCalled();
    });
  });

  it('should review with the review instruction', async () => {
    generate.mockResolvedValueOnce('Документ корректен.');

    await expect(service.review('ДОГОВОР')).resolves.toBe('Документ корректен.');
    expect(generate).toHaveBeenCalledWith(REVIEW_SYSTEM_PROMPT, 'Текст документа:\n\nДОГОВОР', {
      kind: 'review',
      signal: undefined,
    });
  });

  it('should amend with the editing instruction and pass the abort signal through', async () => {
    const controller = new AbortController();
    generate.mockResolvedValueOnce('ДОГОВОР + ШТРАФЫ');

    await expect(
      service.amend('ДОГОВОР', 'добавь штрафы', controller.signal),
    ).resolves.toBe('ДОГОВОР + ШТРАФЫ');
    expect(generate).toHaveBeenCalledWith(expect.any(String), expect.any(String), {
      kind: 'amend',
      signal: controller.signal,
    });
  });
});
