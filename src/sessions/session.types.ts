import type { RoleMap } from '../documents/documents.types';

export type ConversationStep =
  | 'awaiting_description'
  | 'generating'
  | 'awaiting_clarification'
  | 'reviewing'
  | 'filling_variables'
  | 'confirming'
  | 'awaiting_amendment'
  | 'done'
  | 'cancelled';

/**
 * guided: clarifies, then fills variables.
 * auto: drafts at once.
 * smart: clarifies and labels variables by contract party.
 */
export type DraftingMode = 'guided' | 'auto' | 'smart';

export const CONVERSATION_STEPS: readonly ConversationStep[] = [
  'awaiting_description',
  'generating',
  'awaiting_clarification',
  'reviewing',
  'filling_variables',
  'confirming',
  'awaiting_amendment',
  'done',
  'cancelled',
];

export interface ClarificationRecord {
  question: string;
  answer: string;
}

export interface Session {
  userId: string;
  step: ConversationStep;
  mode: DraftingMode;
  initialText: string;
  answers: ClarificationRecord[];
  pendingQuestion: string | null;
  documentText: string;
  review: string | null;
  placeholders: string[];
  variableIndex: number;
  filledVariables: Record<string, string>;
  skippedVariables: string[];
  roleMap: RoleMap | null;
  createdAt: string;
  updatedAt: string;
}

export function createSession(
  userId: string,
  mode: DraftingMode,
  now: Date = new Date(),
): Session {
  const timestamp = now.toISOString();
  return {
    userId,
    step: 'awaiting_description',
    mode,
    initialText: '',
    answers: [],
    pendingQuestion: null,
    documentText: '',
    review: null,
    placeholders: [],
    variableIndex: 0,
    filledVariables: {},
    skippedVariables: [],
    roleMap: null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function isSession(value: unknown): value is Session {
  if (!isRecord(value)) return false;
  const { userId, step, mode, answers, placeholders, filledVariables } = value;
  return (
    typeof userId === 'string' &&
    CONVERSATION_STEPS.some((known) => known === step) &&
    (mode === 'guided' || mode === 'auto' || mode === 'smart') &&
    Array.isArray(answers) &&
    Array.isArray(placeholders) &&
    isRecord(filledVariables)
  );
}

export const SESSION_STORE = 'SESSION_STORE';

export interface SessionStore {
  get(userId: string): Promise<Session | null>;
  /** last write wins */
  set(session: Session): Promise<void>;
  clear(userId: string): Promise<void>;
}
