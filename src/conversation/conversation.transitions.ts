import { validateFieldValue } from '../documents/field-rules';
import type { Session } from '../sessions/session.types';
import { FlowEvent, FlowLimits, GuardName, Transition } from './conversation.types';

export const TRANSITIONS: readonly Transition[] = [
  { from: '*', on: 'cancel', to: 'cancelled', effect: 'cancel' },
  { from: '*', on: 'start', to: 'awaiting_description', effect: 'greet' },

  { from: 'awaiting_description', on: 'text', guard: 'within_limit', to: 'generating', effect: 'draft' },
  { from: 'awaiting_description', on: 'text', guard: 'over_limit', to: 'awaiting_description', effect: 'warn_too_long' },

  { from: 'generating', on: 'question_asked', to: 'awaiting_clarification', effect: 'ask_question' },
  { from: 'generating', on: 'drafted', to: 'reviewing', effect: 'review' },
  { from: 'generating', on: 'failed', to: 'cancelled', effect: 'fail' },

  { from: 'awaiting_clarification', on: 'text', guard: 'within_limit', to: 'generating', effect: 'record_answer' },
  { from: 'awaiting_clarification', on: 'text', guard: 'over_limit', to: 'awaiting_clarification', effect: 'warn_too_long' },
  { from: 'awaiting_clarification', on: 'skip', to: 'generating', effect: 'record_unknown' },
  { from: 'awaiting_clarification', on: 'dont_know', to: 'generating', effect: 'record_unknown' },

  { from: 'reviewing', on: 'placeholders_found', to: 'filling_variables', effect: 'prompt_variable' },
  { from: 'reviewing', on: 'no_placeholders', to: 'confirming', effect: 'present' },
  { from: 'reviewing', on: 'failed', to: 'cancelled', effect: 'fail' },

  { from: 'filling_variables', on: 'text', guard: 'valid_value', to: 'filling_variables', effect: 'accept_value' },
  { from: 'filling_variables', on: 'text', guard: 'invalid_value', to: 'filling_variables', effect: 'reject_value' },
  { from: 'filling_variables', on: 'skip', to: 'filling_variables', effect: 'skip_value' },
  { from: 'filling_variables', on: 'dont_know', to: 'filling_variables', effect: 'blank_value' },
  { from: 'filling_variables', on: 'variable_pending', to: 'filling_variables', effect: 'prompt_variable' },
  { from: 'filling_variables', on: 'all_filled', to: 'confirming', effect: 'present' },

  { from: 'confirming', on: 'confirm', to: 'done', effect: 'finalize' },
  { from: 'confirming', on: 'add_terms', to: 'awaiting_amendment', effect: 'request_amendment' },
  { from: 'confirming', on: 'text', to: 'confirming', effect: 'remind_confirmation' },

  { from: 'awaiting_amendment', on: 'text', guard: 'within_limit', to: 'awaiting_amendment', effect: 'amend' },
  { from: 'awaiting_amendment', on: 'text', guard: 'over_limit', to: 'awaiting_amendment', effect: 'warn_too_long' },
  { from: 'awaiting_amendment', on: 'amended', to: 'confirming', effect: 'present' },
  { from: 'awaiting_amendment', on: 'failed', to: 'cancelled', effect: 'fail' },

  { from: 'done', on: 'failed', to: 'cancelled', effect: 'fail' },
];

const eventText = (event: FlowEvent): string => (event.type === 'text' ? event.text : '');

export function currentPlaceholder(session: Session): string | undefined {
  return session.placeholders[session.variableIndex];
}

const isValidValue = (session: Session, event: FlowEvent): boolean => {
  const placeholder = currentPlaceholder(session);
  return placeholder !== undefined && validateFieldValue(placeholder, eventText(event)).ok;
};

export const GUARDS: Record<
  GuardName,
  (session: Session, event: FlowEvent, limits: FlowLimits) => boolean
> = {
  within_limit: (_s, event, limits) => {
    const text = eventText(event);
    return text.trim().length > 0 && text.length <= limits.maxDescriptionLength;
  },
  over_limit: (_s, event, limits) => eventText(event).length > limits.maxDescriptionLength,
  valid_value: (session, event) => isValidValue(session, event),
  invalid_value: (session, event) => !isValidValue(session, event),
};

/**
 * First row whose source, event and guard match. Rows for the current step
 * take precedence over wildcard rows.
 */
export function resolveTransition(
  session: Session,
  event: FlowEvent,
  limits: FlowLimits,
  table: readonly Transition[] = TRANSITIONS,
): Transition | null {
  const candidates = table.filter((row) => row.on === event.type);
  const ordered = [
    ...candidates.filter((row) => row.from === session.step),
    ...candidates.filter((row) => row.from === '*'),
  ];

  return (
    ordered.find((row) => !row.guard || GUARDS[row.guard](session, event, limits)) ?? null
  );
}
