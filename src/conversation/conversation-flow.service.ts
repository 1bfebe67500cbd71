import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GenerationAbortedError } from '../ai/generation.error';
import { AuditService } from '../audit/audit.service';
import { DocumentExporterService } from '../documents/document-exporter.service';
import type { ExportedDocument } from '../documents/document-exporter.service';
import { roleOf } from '../documents/documents.types';
import { findFieldRule, validateFieldValue } from '../documents/field-rules';
import {
  humanizePlaceholder,
  listPlaceholders,
  substitutePlaceholders,
} from '../documents/placeholders';
import { RoleClassifierService } from '../documents/role-classifier.service';
import { inferDocumentType } from '../drafting/document-type';
import { DraftingService } from '../drafting/drafting.service';
import { createSession, SESSION_STORE } from '../sessions/session.types';
import type { Session, SessionStore } from '../sessions/session.types';
import { KeyedSerialQueue } from '../shared/lib/keyed-queue';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';
import { BLANK_VALUE, messages, noSession, UNKNOWN_ANSWER } from './conversation.messages';
import { currentPlaceholder, resolveTransition } from './conversation.transitions';
import {
  BotReply,
  EffectContext,
  EffectName,
  ExternalEvent,
  FailureReason,
  FlowEvent,
  FlowLimits,
  InternalEvent,
  KeyboardKind,
  ReplyChannel,
} from './conversation.types';

type Effect = (ctx: EffectContext) => Promise<InternalEvent | null>;

const EXTERNAL_EVENT_TYPES: readonly FlowEvent['type'][] = [
  'start',
  'text',
  'skip',
  'dont_know',
  'confirm',
  'add_terms',
  'cancel',
];

// an effect chain longer than this is a broken transition table
const MAX_CHAIN_LENGTH = 32;

const KEYBOARD_BY_STEP: Partial<Record<Session['step'], KeyboardKind>> = {
  awaiting_clarification: 'clarification',
  filling_variables: 'variable',
  confirming: 'confirmation',
  awaiting_amendment: 'cancel_only',
};

/**
 * Drives one user's document conversation: resolves each event against the
 * transition table, runs the effect and follows the internal events it emits.
 */
@Injectable()
export class ConversationFlowService {
  private readonly limits: FlowLimits;
  private readonly queue = new KeyedSerialQueue();
  private readonly inFlight = new Map<string, AbortController>();
  private readonly effects: Record<EffectName, Effect>;

  constructor(
    @Inject(SESSION_STORE) private readonly store: SessionStore,
    private readonly drafting: DraftingService,
    private readonly roleClassifier: RoleClassifierService,
    private readonly exporter: DocumentExporterService,
    private readonly audit: AuditService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
    config: ConfigService,
  ) {
    this.limits = {
      maxDescriptionLength: Number(config.get('MAX_DESCRIPTION_LENGTH') ?? 2000),
      maxClarifications: Number(config.get('MAX_CLARIFICATIONS') ?? 3),
    };

    this.effects = {
      cancel: (ctx) => this.onCancel(ctx),
      greet: (ctx) => this.greet(ctx),
      draft: (ctx) => this.startDrafting(ctx),
      warn_too_long: (ctx) => this.warnTooLong(ctx),
      ask_question: (ctx) => this.askQuestion(ctx),
      review: (ctx) => this.review(ctx),
      fail: (ctx) => this.fail(ctx),
      record_answer: (ctx) => this.recordAnswer(ctx),
      record_unknown: (ctx) => this.recordUnknown(ctx),
      prompt_variable: (ctx) => this.promptVariable(ctx),
      present: (ctx) => this.present(ctx),
      accept_value: (ctx) => this.acceptValue(ctx),
      reject_value: (ctx) => this.rejectValue(ctx),
      skip_value: (ctx) => this.skipValue(ctx),
      blank_value: (ctx) => this.blankValue(ctx),
      finalize: (ctx) => this.finalize(ctx),
      request_amendment: (ctx) => this.requestAmendment(ctx),
      remind_confirmation: (ctx) => this.remindConfirmation(ctx),
      amend: (ctx) => this.amend(ctx),
    };
  }

  /**
   * Entry point for chat events. Events of one user run in arrival order;
   * `cancel` jumps the queue and aborts the pending model call.
   */
  async handle(userId: string, event: ExternalEvent, channel: ReplyChannel): Promise<void> {
    if (event.type === 'cancel') {
      return this.cancel(userId, channel);
    }
    return this.queue.run(userId, () => this.process(userId, event, channel));
  }

  private async cancel(userId: string, channel: ReplyChannel): Promise<void> {
    this.inFlight.get(userId)?.abort();
    this.inFlight.delete(userId);

    const session = (await this.store.get(userId)) ?? createSession(userId, 'smart');
    const result = await this.dispatch(session, { type: 'cancel' }, channel, new AbortController().signal);
    await this.persist(result);
  }

  private async process(userId: string, event: ExternalEvent, channel: ReplyChannel): Promise<void> {
    const controller = new AbortController();
    this.inFlight.set(userId, controller);

    // nothing reaches the user once the conversation was cancelled
    const guarded: ReplyChannel = {
      send: async (reply: BotReply) => {
        if (!controller.signal.aborted) await channel.send(reply);
      },
    };

    try {
      const session = (await this.store.get(userId)) ?? this.newSessionFor(userId, event);
      if (!session) {
        await guarded.send({ kind: 'text', text: noSession, keyboard: 'main_menu' });
        return;
      }

      const result = await this.dispatch(session, event, guarded, controller.signal);
      if (controller.signal.aborted) {
        await this.logger.debug(`flow(${userId}): aborted, session not written back`);
        return;
      }
      await this.persist(result);
    } finally {
      if (this.inFlight.get(userId) === controller) this.inFlight.delete(userId);
    }
  }

  private newSessionFor(userId: string, event: ExternalEvent): Session | null {
    if (event.type === 'start') return createSession(userId, event.mode);
    if (event.type === 'text') return createSession(userId, 'smart');
    return null;
  }

  /**
   * Runs the event and every internal event it leads to. Mutates and returns
   * the session.
   */
  async dispatch(
    session: Session,
    event: FlowEvent,
    channel: ReplyChannel,
    signal: AbortSignal,
  ): Promise<Session> {
    let next: FlowEvent | null = event;
    let chain = 0;

    while (next) {
      if (++chain > MAX_CHAIN_LENGTH) {
        throw new Error(`flow(${session.userId}): transition chain too long at ${session.step}`);
      }

      const transition = resolveTransition(session, next, this.limits);
      if (!transition) {
        await this.unmatched(session, next, channel);
        break;
      }

      await this.logger.debug(
        `flow(${session.userId}): ${session.step} --${next.type}--> ${transition.to} [${transition.effect}]`,
      );
      session.step = transition.to;
      next = await this.effects[transition.effect]({ session, event: next, channel, signal });

      if (signal.aborted) break;
    }

    session.updatedAt = new Date().toISOString();
    return session;
  }

  private async persist(session: Session): Promise<void> {
    if (session.step === 'done' || session.step === 'cancelled') {
      await this.store.clear(session.userId);
    } else {
      await this.store.set(session);
    }
  }

  private async unmatched(session: Session, event: FlowEvent, channel: ReplyChannel): Promise<void> {
    if (!EXTERNAL_EVENT_TYPES.includes(event.type)) {
      await this.logger.error(`flow(${session.userId}): no transition for ${event.type} in ${session.step}`);
      return;
    }
    await channel.send({
      kind: 'text',
      text: messages.notUnderstood(session.step),
      keyboard: KEYBOARD_BY_STEP[session.step] ?? 'main_menu',
    });
  }

  private async failure(
    session: Session,
    error: unknown,
    reason: FailureReason,
  ): Promise<InternalEvent | null> {
    if (error instanceof GenerationAbortedError) return null;

    const message = error instanceof Error ? error.message : String(error);
    await this.logger.error(
      `flow(${session.userId}): ${reason} failed in ${session.step}: ${message}`,
      error instanceof Error ? error.stack : undefined,
      { userId: session.userId, step: session.step, mode: session.mode },
    );
    return { type: 'failed', reason };
  }

  private text(ctx: EffectContext): string {
    return ctx.event.type === 'text' ? ctx.event.text.trim() : '';
  }

  // ── effects ──────────────────────────────────────────────

  private async onCancel({ channel }: EffectContext): Promise<null> {
    await channel.send({ kind: 'text', text: messages.cancelled, keyboard: 'main_menu' });
    return null;
  }

  private async greet({ session, event, channel }: EffectContext): Promise<null> {
    const mode = event.type === 'start' ? event.mode : session.mode;
    Object.assign(session, createSession(session.userId, mode));
    await channel.send({ kind: 'text', text: messages.greeting(mode), keyboard: 'main_menu' });
    return null;
  }

  private async warnTooLong({ channel, session }: EffectContext): Promise<null> {
    await channel.send({
      kind: 'text',
      text: messages.tooLong(this.limits.maxDescriptionLength),
      keyboard: KEYBOARD_BY_STEP[session.step],
    });
    return null;
  }

  private async startDrafting(ctx: EffectContext): Promise<InternalEvent | null> {
    ctx.session.initialText = this.text(ctx);
    await ctx.channel.send({ kind: 'text', text: messages.checking });
    return this.advanceGeneration(ctx);
  }

  private async recordAnswer(ctx: EffectContext): Promise<InternalEvent | null> {
    ctx.session.answers.push({
      question: ctx.session.pendingQuestion ?? '',
      answer: this.text(ctx),
    });
    ctx.session.pendingQuestion = null;
    return this.advanceGeneration(ctx);
  }

  private async recordUnknown(ctx: EffectContext): Promise<InternalEvent | null> {
    ctx.session.answers.push({
      question: ctx.session.pendingQuestion ?? '',
      answer: UNKNOWN_ANSWER,
    });
    ctx.session.pendingQuestion = null;
    return this.advanceGeneration(ctx);
  }

  /** Clarify while questions remain, otherwise draft. A cached request skips both. */
  private async advanceGeneration({ session, channel, signal }: EffectContext): Promise<InternalEvent | null> {
    try {
      if (session.answers.length === 0) {
        const cached = await this.drafting.cachedDraft(session.initialText);
        if (cached) {
          await channel.send({ kind: 'text', text: messages.cacheHit });
          session.documentText = cached;
          return { type: 'drafted' };
        }
      }

      if (session.mode !== 'auto' && session.answers.length < this.limits.maxClarifications) {
        const question = await this.drafting.askClarifyingQuestion(
          session.initialText,
          session.answers,
          signal,
        );
        if (question) {
          session.pendingQuestion = question;
          return { type: 'question_asked' };
        }
      }

      await channel.send({ kind: 'text', text: messages.drafting });
      const draft = await this.drafting.draft(session.initialText, session.answers, signal);
      if (draft.cached) {
        await channel.send({ kind: 'text', text: messages.cacheHit });
      }
      session.documentText = draft.text;
      return { type: 'drafted' };
    } catch (error: unknown) {
      return this.failure(session, error, 'generation');
    }
  }

  private async askQuestion({ session, channel }: EffectContext): Promise<null> {
    await channel.send({
      kind: 'text',
      text: messages.clarify(session.pendingQuestion ?? ''),
      keyboard: 'clarification',
    });
    return null;
  }

  private async review({ session, channel, signal }: EffectContext): Promise<InternalEvent | null> {
    try {
      await channel.send({ kind: 'text', text: messages.reviewing });
      session.review = await this.drafting.review(session.documentText, signal);
      await channel.send({ kind: 'text', text: messages.review(session.review) });

      session.placeholders = listPlaceholders(session.documentText);
      session.variableIndex = 0;
      session.filledVariables = {};
      session.skippedVariables = [];

      if (!session.placeholders.length) return { type: 'no_placeholders' };

      if (session.mode === 'smart') {
        session.roleMap = await this.roleClassifier.classifyRoles(
          session.documentText,
          session.placeholders,
          signal,
        );
      }
      await channel.send({ kind: 'text', text: messages.variablesIntro(session.placeholders.length) });
      return { type: 'placeholders_found' };
    } catch (error: unknown) {
      return this.failure(session, error, 'generation');
    }
  }

  private async fail({ event, channel }: EffectContext): Promise<null> {
    const reason = event.type === 'failed' ? event.reason : 'generation';
    await channel.send({
      kind: 'text',
      text: reason === 'export' ? messages.exportFailed : messages.generationFailed,
      keyboard: 'main_menu',
    });
    return null;
  }

  private async promptVariable({ session, channel }: EffectContext): Promise<null> {
    const placeholder = currentPlaceholder(session);
    if (placeholder === undefined) return null;

    await channel.send({
      kind: 'text',
      text: messages.variablePrompt({
        index: session.variableIndex + 1,
        total: session.placeholders.length,
        label: humanizePlaceholder(placeholder),
        role: roleOf(session.roleMap, placeholder),
        description: session.roleMap?.fieldDescriptions[placeholder],
        hint: findFieldRule(placeholder).hint,
      }),
      keyboard: 'variable',
    });
    return null;
  }

  private nextVariable(session: Session): InternalEvent {
    session.variableIndex += 1;
    return session.variableIndex < session.placeholders.length
      ? { type: 'variable_pending' }
      : { type: 'all_filled' };
  }

  private async acceptValue(ctx: EffectContext): Promise<InternalEvent | null> {
    const placeholder = currentPlaceholder(ctx.session);
    if (placeholder === undefined) return { type: 'all_filled' };

    const validation = validateFieldValue(placeholder, this.text(ctx));
    if (!validation.ok) return this.rejectValue(ctx);

    ctx.session.filledVariables[placeholder] = validation.value;
    return this.nextVariable(ctx.session);
  }

  private async rejectValue(ctx: EffectContext): Promise<null> {
    const placeholder = currentPlaceholder(ctx.session);
    if (placeholder === undefined) return null;

    const validation = validateFieldValue(placeholder, this.text(ctx));
    const error = validation.ok ? findFieldRule(placeholder).error : validation.error;
    await ctx.channel.send({ kind: 'text', text: messages.invalidValue(error), keyboard: 'variable' });
    return null;
  }

  private async skipValue({ session }: EffectContext): Promise<InternalEvent> {
    const placeholder = currentPlaceholder(session);
    if (placeholder !== undefined) session.skippedVariables.push(placeholder);
    return this.nextVariable(session);
  }

  private async blankValue({ session }: EffectContext): Promise<InternalEvent> {
    const placeholder = currentPlaceholder(session);
    if (placeholder !== undefined) session.filledVariables[placeholder] = BLANK_VALUE;
    return this.nextVariable(session);
  }

  private renderDocument(session: Session): string {
    return substitutePlaceholders(session.documentText, session.filledVariables);
  }

  private async present({ session, channel }: EffectContext): Promise<null> {
    await channel.send({
      kind: 'text',
      text: messages.preview(this.renderDocument(session)),
      keyboard: 'confirmation',
    });
    return null;
  }

  private async finalize({ session, channel }: EffectContext): Promise<InternalEvent | null> {
    const text = this.renderDocument(session);
    const documentType = inferDocumentType(session.initialText);

    let exported: ExportedDocument;
    try {
      exported = await this.exporter.export(text, session.userId, documentType);
    } catch (error: unknown) {
      return this.failure(session, error, 'export');
    }

    await channel.send({
      kind: 'document',
      filePath: exported.filePath,
      filename: exported.filename,
      caption: messages.documentReady,
      keyboard: 'main_menu',
    });

    const unfilled = listPlaceholders(text);
    if (unfilled.length) {
      await channel.send({ kind: 'text', text: messages.unfilled(unfilled) });
    }

    await this.audit.record({
      userId: session.userId,
      documentType,
      fields: session.filledVariables,
      mode: session.mode,
      createdAt: new Date().toISOString(),
    });
    return null;
  }

  private async requestAmendment({ channel }: EffectContext): Promise<null> {
    await channel.send({ kind: 'text', text: messages.askAmendment, keyboard: 'cancel_only' });
    return null;
  }

  private async remindConfirmation({ channel }: EffectContext): Promise<null> {
    await channel.send({ kind: 'text', text: messages.useButtons, keyboard: 'confirmation' });
    return null;
  }

  private async amend(ctx: EffectContext): Promise<InternalEvent | null> {
    const { session, channel, signal } = ctx;
    try {
      await channel.send({ kind: 'text', text: messages.amending });
      session.documentText = await this.drafting.amend(
        this.renderDocument(session),
        this.text(ctx),
        signal,
      );
      return { type: 'amended' };
    } catch (error: unknown) {
      return this.failure(session, error, 'generation');
    }
  }
}
