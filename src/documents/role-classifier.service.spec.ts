import { Test, TestingModule } from '@nestjs/testing';
import { parseRoleMap, RoleClassifierService } from './role-classifier.service';
import { AiService } from '../ai/ai.service';
import { GenerationAbortedError, GenerationError } from '../ai/generation.error';
import { ROLE_CLASSIFICATION_SYSTEM_PROMPT } from '../drafting/prompts';
import { LOGGER_SERVICE } from '../shared/types';

describe('RoleClassifierService', () => {
  let service: RoleClassifierService;
  let generate: jest.Mock;
  let warn: jest.Mock;

  const placeholders = ['ФИО_АРЕНДОДАТЕЛЯ', 'ФИО_АРЕНДАТОРА'];

  beforeEach(async () => {
    generate = jest.fn();
    warn = jest.fn().mockResolvedValue(undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RoleClassifierService,
        { provide: AiService, useValue: { generate } },
        {
          provide: LOGGER_SERVICE,
          useValue: { warn, debug: jest.fn().mockResolvedValue(undefined) },
        },
      ],
    }).compile();

    service = module.get<RoleClassifierService>(RoleClassifierService);
  });

  it('should parse roles and descriptions from the reply', async () => {
    generate.mockResolvedValueOnce(
      'Вот результат: {"roles": {"Арендодатель": ["ФИО_АРЕНДОДАТЕЛЯ"], "Арендатор": ["ФИО_АРЕНДАТОРА"]},' +
        ' "field_descriptions": {"ФИО_АРЕНДАТОРА": "ФИО арендатора полностью"}}',
    );

    const roleMap = await service.classifyRoles('ДОГОВОР', placeholders);

    expect(roleMap).toEqual({
      roles: { Арендодатель: ['ФИО_АРЕНДОДАТЕЛЯ'], Арендатор: ['ФИО_АРЕНДАТОРА'] },
      fieldDescriptions: { ФИО_АРЕНДАТОРА: 'ФИО арендатора полностью' },
    });
    expect(generate).toHaveBeenCalledWith(
      ROLE_CLASSIFICATION_SYSTEM_PROMPT,
      expect.stringContaining('Переменные: ФИО_АРЕНДОДАТЕЛЯ, ФИО_АРЕНДАТОРА'),
      { kind: 'classify_roles', signal: undefined },
    );
  });

  it('should fall back to an empty map and warn on malformed JSON', async () => {
    generate.mockResolvedValueOnce('{"roles": [не json');

    await expect(service.classifyRoles('ДОГОВОР', placeholders)).resolves.toEqual({
      roles: {},
      fieldDescriptions: {},
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back to an empty map when generation fails', async () => {
    generate.mockRejectedValueOnce(new GenerationError('boom', 'network', 1));

    await expect(service.classifyRoles('ДОГОВОР', placeholders)).resolves.toEqual({
      roles: {},
      fieldDescriptions: {},
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow when the call was aborted', async () => {
    generate.mockRejectedValueOnce(new GenerationAbortedError('classify_roles'));

    await expect(service.classifyRoles('ДОГОВОР', placeholders)).rejects.toBeInstanceOf(
      GenerationAbortedError,
    );
  });

  it('should skip the call when there are no placeholders', async () => {
    await expect(service.classifyRoles('ДОГОВОР', [])).resolves.toEqual({
      roles: {},
      fieldDescriptions: {},
    });
    expect(generate).not.toHaveBeenCalled();
  });
});

describe('parseRoleMap', () => {
  it('should drop unknown fields and non-string entries', () => {
    expect(
      parseRoleMap('{"roles": {"Сторона": ["A", "Z", 5], "Пустая": ["Z"]}, "field_descriptions": {"Z": "нет"}}', [
        'A',
      ]),
    ).toEqual({ roles: { Сторона: ['A'] }, fieldDescriptions: {} });
  });

  it('should return null when the reply has no object', () => {
    expect(parseRoleMap('[1, 2]', ['A'])).toBeNull();
  });
});
