import {
  CLARIFICATION_DONE_MARKER,
  CLARIFICATION_SYSTEM_PROMPT,
  EDITING_SYSTEM_PROMPT,
  PLACEHOLDER_CONVENTION,
  REVIEW_SYSTEM_PROMPT,
  ROLE_CLASSIFICATION_SYSTEM_PROMPT,
} from './prompts';

export interface ClarificationAnswer {
  question: string;
  answer: string;
}

export interface ComposedPrompt {
  system: string;
  user: string;
}

export class PromptCompositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptCompositionError';
  }
}

function requireText(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new PromptCompositionError(`${label} must not be empty`);
  }
  return trimmed;
}

function formatAnswers(answers: ClarificationAnswer[]): string {
  return answers
    .map((a, i) => `${i + 1}. ${a.question.trim()}\n   Ответ: ${a.answer.trim()}`)
    .join('\n');
}

/**
 * Drafting instruction: style guide as system prompt, the client's request,
 * accumulated clarifications and the placeholder convention as user prompt.
 */
export function composeDrafting(
  styleGuide: string,
  userText: string,
  answers: ClarificationAnswer[] = [],
): ComposedPrompt {
  const parts = [`Запрос клиента:\n${requireText(userText, 'userText')}`];

  if (answers.length) {
    parts.push(`Уточнения клиента:\n${formatAnswers(answers)}`);
  }

  parts.push(PLACEHOLDER_CONVENTION);

  return {
    system: requireText(styleGuide, 'styleGuide'),
    user: parts.join('\n\n'),
  };
}

export function composeEditing(documentText: string, amendment: string): ComposedPrompt {
  return {
    system: EDITING_SYSTEM_PROMPT,
    user: [
      `Документ:\n\n${requireText(documentText, 'documentText')}`,
      `Просьба клиента: ${requireText(amendment, 'amendment')}`,
    ].join('\n\n'),
  };
}

export function composeClarification(
  userText: string,
  answers: ClarificationAnswer[] = [],
): ComposedPrompt {
  const parts = [`Запрос клиента:\n${requireText(userText, 'userText')}`];

  if (answers.length) {
    parts.push(`Уже заданные вопросы и ответы:\n${formatAnswers(answers)}`);
  }

  parts.push(
    `Какой ОДИН вопрос ещё нужно задать? Если всё понятно, ответь: ${CLARIFICATION_DONE_MARKER}`,
  );

  return { system: CLARIFICATION_SYSTEM_PROMPT, user: parts.join('\n\n') };
}

export function composeReview(documentText: string): ComposedPrompt {
  return {
    system: REVIEW_SYSTEM_PROMPT,
    user: `Текст документа:\n\n${requireText(documentText, 'documentText')}`,
  };
}

export function composeRoleClassification(
  documentText: string,
  placeholders: string[],
): ComposedPrompt {
  return {
    system: ROLE_CLASSIFICATION_SYSTEM_PROMPT,
    user: [
      `Переменные: ${placeholders.join(', ')}`,
      `Текст договора:\n\n${requireText(documentText, 'documentText')}`,
    ].join('\n\n'),
  };
}
