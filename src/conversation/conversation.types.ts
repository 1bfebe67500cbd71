import type { ConversationStep, DraftingMode, Session } from '../sessions/session.types';

export type ExternalEvent =
  | { type: 'start'; mode: DraftingMode }
  | { type: 'text'; text: string }
  | { type: 'skip' }
  | { type: 'dont_know' }
  | { type: 'confirm' }
  | { type: 'add_terms' }
  | { type: 'cancel' };

export type FailureReason = 'generation' | 'export';

/** Emitted by effects to keep the dispatch loop going. */
export type InternalEvent =
  | { type: 'question_asked' }
  | { type: 'drafted' }
  | { type: 'failed'; reason: FailureReason }
  | { type: 'placeholders_found' }
  | { type: 'no_placeholders' }
  | { type: 'variable_pending' }
  | { type: 'all_filled' }
  | { type: 'amended' };

export type FlowEvent = ExternalEvent | InternalEvent;
export type FlowEventType = FlowEvent['type'];

export type EffectName =
  | 'cancel'
  | 'greet'
  | 'draft'
  | 'warn_too_long'
  | 'ask_question'
  | 'review'
  | 'fail'
  | 'record_answer'
  | 'record_unknown'
  | 'prompt_variable'
  | 'present'
  | 'accept_value'
  | 'reject_value'
  | 'skip_value'
  | 'blank_value'
  | 'finalize'
  | 'request_amendment'
  | 'remind_confirmation'
  | 'amend';

export type GuardName = 'within_limit' | 'over_limit' | 'valid_value' | 'invalid_value';

export interface FlowLimits {
  maxDescriptionLength: number;
  maxClarifications: number;
}

export interface Transition {
  from: ConversationStep | '*';
  on: FlowEventType;
  guard?: GuardName;
  to: ConversationStep;
  effect: EffectName;
}

export type KeyboardKind = 'main_menu' | 'clarification' | 'variable' | 'confirmation' | 'cancel_only';

export type BotReply =
  | { kind: 'text'; text: string; keyboard?: KeyboardKind }
  | {
      kind: 'document';
      filePath: string;
      filename: string;
      caption?: string;
      keyboard?: KeyboardKind;
    };

/** Where the flow sends its replies; the chat adapter renders them. */
export interface ReplyChannel {
  send(reply: BotReply): Promise<void>;
}

export interface EffectContext {
  session: Session;
  event: FlowEvent;
  channel: ReplyChannel;
  signal: AbortSignal;
}
