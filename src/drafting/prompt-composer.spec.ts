import {
  composeClarification,
  composeDrafting,
  composeEditing,
  composeReview,
  composeRoleClassification,
  PromptCompositionError,
} from './prompt-composer';
import {
  CLARIFICATION_SYSTEM_PROMPT,
  EDITING_SYSTEM_PROMPT,
  LEGAL_STYLE_GUIDE,
  PLACEHOLDER_CONVENTION,
  REVIEW_SYSTEM_PROMPT,
} from './prompts';

describe('prompt composer', () => {
  describe('composeDrafting', () => {
    it('should use the style guide as system prompt and append the placeholder convention', () => {
      const prompt = composeDrafting(LEGAL_STYLE_GUIDE, '  Нужен договор аренды офиса  ');

      expect(prompt.system).toBe(LEGAL_STYLE_GUIDE);
      expect(prompt.user).toBe(
        `Запрос клиента:\nНужен договор аренды офиса\n\n${PLACEHOLDER_CONVENTION}`,
      );
    });

    it('should list clarification answers in the order they were given', () => {
      const prompt = composeDrafting(LEGAL_STYLE_GUIDE, 'Договор аренды', [
        { question: 'Какой срок аренды?', answer: '1 год' },
        { question: 'Кто платит коммунальные услуги?', answer: 'Арендатор' },
      ]);

      expect(prompt.user).toBe(
        [
          'Запрос клиента:\nДоговор аренды',
          'Уточнения клиента:\n1. Какой срок аренды?\n   Ответ: 1 год\n2. Кто платит коммунальные услуги?\n   Ответ: Арендатор',
          PLACEHOLDER_CONVENTION,
        ].join('\n\n'),
      );
    });

    it('should reject an empty request', () => {
      expect(() => composeDrafting(LEGAL_STYLE_GUIDE, '   ')).toThrow(PromptCompositionError);
      expect(() => composeDrafting(LEGAL_STYLE_GUIDE, '')).toThrow('userText must not be empty');
    });
  });

  it('should combine the document and the amendment in the editing instruction', () => {
    const prompt = composeEditing('1. ПРЕДМЕТ ДОГОВОРА', 'добавь пункт о штрафах');

    expect(prompt).toEqual({
      system: EDITING_SYSTEM_PROMPT,
      user: 'Документ:\n\n1. ПРЕДМЕТ ДОГОВОРА\n\nПросьба клиента: добавь пункт о штрафах',
    });
  });

  it('should ask for one more clarification and mention the done marker', () => {
    const prompt = composeClarification('Договор оказания услуг', [
      { question: 'Какие услуги?', answer: 'Уборка офиса' },
    ]);

    expect(prompt.system).toBe(CLARIFICATION_SYSTEM_PROMPT);
    expect(prompt.user).toBe(
      'Запрос клиента:\nДоговор оказания услуг\n\n' +
        'Уже заданные вопросы и ответы:\n1. Какие услуги?\n   Ответ: Уборка офиса\n\n' +
        'Какой ОДИН вопрос ещё нужно задать? Если всё понятно, ответь: ГОТОВО',
    );
  });

  it('should wrap the document for review', () => {
    expect(composeReview('Текст')).toEqual({
      system: REVIEW_SYSTEM_PROMPT,
      user: 'Текст документа:\n\nТекст',
    });
  });

  it('should list placeholders for role classification', () => {
    const prompt = composeRoleClassification('Договор [ФИО_АРЕНДАТОРА]', [
      'ФИО_АРЕНДАТОРА',
      'ИНН_АРЕНДАТОРА',
    ]);

    expect(prompt.user).toBe(
      'Переменные: ФИО_АРЕНДАТОРА, ИНН_АРЕНДАТОРА\n\nТекст договора:\n\nДоговор [ФИО_АРЕНДАТОРА]',
    );
  });
});
