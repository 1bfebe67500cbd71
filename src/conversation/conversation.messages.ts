import type { ConversationStep, DraftingMode } from '../sessions/session.types';

export const PREVIEW_LENGTH = 3500;
export const BLANK_VALUE = '__________';
export const UNKNOWN_ANSWER = 'Не знаю';

const GREETINGS: Record<DraftingMode, string> = {
  guided:
    '👋 Привет! Я помогу составить юридический документ по российскому праву.\n' +
    'Опиши, что тебе нужно 👇 Я задам несколько уточняющих вопросов.',
  auto: '⚡ Быстрый режим: опиши документ одним сообщением, и я сразу составлю черновик 👇',
  smart:
    '🧠 Умный режим: опиши, какой документ нужен 👇\n' +
    'Я уточню детали и помогу заполнить реквизиты каждой стороны.',
};

export const messages = {
  greeting: (mode: DraftingMode) => GREETINGS[mode],
  cancelled: 'Ок! Если понадобится, нажми «✍️ Создать документ»',
  tooLong: (limit: number) =>
    `⚠️ Слишком длинное сообщение. Уложись, пожалуйста, в ${limit} символов.`,
  checking: '🔍 Проверяю, можно ли составить документ…',
  drafting: '✍️ Составляю документ…',
  cacheHit: '📦 Нашёл похожий запрос',
  clarify: (question: string) => `🤔 Пожалуйста, уточни:\n${question}`,
  reviewing: '⚖️ Провожу юридическую проверку…',
  review: (text: string) => `⚖️ Юридическая проверка:\n${text}`,
  variablesIntro: (count: number) =>
    `📋 В документе ${count} поле(й) для заполнения. Введи значения по очереди.`,
  variablePrompt: (options: {
    index: number;
    total: number;
    label: string;
    role?: string;
    description?: string;
    hint?: string;
  }) =>
    [
      `✏️ Поле ${options.index} из ${options.total}: «${options.label}»`,
      options.role ? `Сторона: ${options.role}` : '',
      options.description ?? '',
      options.hint ? `Формат: ${options.hint}` : '',
    ]
      .filter(Boolean)
      .join('\n'),
  invalidValue: (error: string) => `${error}\nПопробуй ещё раз.`,
  preview: (text: string) =>
    `📄 Черновик документа:\n\n${text.slice(0, PREVIEW_LENGTH)}${
      text.length > PREVIEW_LENGTH ? '\n…' : ''
    }\n\nВсё верно?`,
  documentReady: '📄 Документ готов.',
  unfilled: (names: string[]) =>
    `⚠️ В документе остались незаполненные поля: ${names
      .map((n) => `[${n}]`)
      .join(', ')}. Заполни их вручную.`,
  askAmendment: '✏️ Опиши, какие условия добавить или изменить:',
  amending: '🔄 Вношу изменения…',
  useButtons: '👆 Выбери действие кнопками под сообщением: подтвердить, добавить условия или отменить.',
  generationFailed: '⚠️ Что-то пошло не так. Попробуй снова или измени описание.',
  exportFailed: '⚠️ Не удалось сформировать файл. Попробуй ещё раз позже.',
  notUnderstood: (step: ConversationStep) => NOT_UNDERSTOOD[step],
};

const NOT_UNDERSTOOD: Record<ConversationStep, string> = {
  awaiting_description: '🤷 Не понял. Опиши текстом, какой документ нужен.',
  generating: '⏳ Я ещё работаю над документом, подожди немного.',
  awaiting_clarification: '🤷 Ответь на вопрос текстом или нажми «Не знаю».',
  reviewing: '⏳ Я ещё проверяю документ, подожди немного.',
  filling_variables: '🤷 Введи значение текстом или воспользуйся кнопками.',
  confirming: '👆 Выбери действие кнопками под черновиком.',
  awaiting_amendment: '✏️ Опиши текстом, какие условия добавить.',
  done: '✅ Документ уже готов. Нажми «✍️ Создать документ», чтобы начать заново.',
  cancelled: '👋 Нажми «✍️ Создать документ», чтобы начать заново.',
};

export const noSession = '👋 Нажми «✍️ Создать документ» или отправь /start, чтобы начать.';
