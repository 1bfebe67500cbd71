import { Inject, Injectable } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { DraftCacheService } from './draft-cache.service';
import {
  ClarificationAnswer,
  ComposedPrompt,
  composeClarification,
  composeDrafting,
  composeEditing,
  composeReview,
} from './prompt-composer';
import { CLARIFICATION_DONE_MARKER, LEGAL_STYLE_GUIDE } from './prompts';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

export interface DraftResult {
  text: string;
  cached: boolean;
}

@Injectable()
export class DraftingService {
  constructor(
    private readonly aiService: AiService,
    private readonly cache: DraftCacheService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  /**
   * Asks the model for one missing-data question.
   * Returns null when the reply is not a question (the model considers the
   * request complete).
   */
  async askClarifyingQuestion(
    userText: string,
    answers: ClarificationAnswer[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    const prompt = composeClarification(userText, answers);
    const reply = await this.aiService.generate(prompt.system, prompt.user, {
      kind: 'clarify',
      signal,
    });

    if (!reply.includes('?') || reply.toUpperCase().startsWith(CLARIFICATION_DONE_MARKER)) {
      await this.logger.debug(`askClarifyingQuestion(): no question needed, reply="${reply.slice(0, 80)}"`);
      return null;
    }

    return reply;
  }

  /**
   * Cache lookup for the draft of the bare request, before any
   * clarification answers are collected.
   */
  async cachedDraft(userText: string): Promise<string | null> {
    const cacheKey = this.cacheKeyFor(composeDrafting(LEGAL_STYLE_GUIDE, userText, []));
    const cached = await this.cache.load(cacheKey);
    if (cached) {
      await this.logger.log(`cachedDraft(): cache hit ${this.cache.keyFor(cacheKey).slice(0, 12)}`);
    }
    return cached;
  }

  async draft(
    userText: string,
    answers: ClarificationAnswer[],
    signal?: AbortSignal,
  ): Promise<DraftResult> {
    const prompt = composeDrafting(LEGAL_STYLE_GUIDE, userText, answers);
    const cacheKey = this.cacheKeyFor(prompt);

    const cached = await this.cache.load(cacheKey);
    if (cached) {
      await this.logger.log(`draft(): cache hit ${this.cache.keyFor(cacheKey).slice(0, 12)}`);
      return { text: cached, cached: true };
    }

    const text = await this.aiService.generate(prompt.system, prompt.user, {
      kind: 'draft',
      signal,
    });
    await this.cache.save(cacheKey, text);

    return { text, cached: false };
  }

  async review(documentText: string, signal?: AbortSignal): Promise<string> {
    const prompt = composeReview(documentText);
    return this.aiService.generate(prompt.system, prompt.user, { kind: 'review', signal });
  }

  async amend(
    documentText: string,
    amendment: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const prompt = composeEditing(documentText, amendment);
    return this.aiService.generate(prompt.system, prompt.user, { kind: 'amend', signal });
  }

  private cacheKeyFor(prompt: ComposedPrompt): string {
    return `${prompt.system}\n\n${prompt.user}`;
  }
}
