import { Inject, Injectable } from '@nestjs/common';
import { AiService } from '../ai/ai.service';
import { GenerationAbortedError } from '../ai/generation.error';
import { composeRoleClassification } from '../drafting/prompt-composer';
import { emptyRoleMap, RoleMap } from './documents.types';
import { LOGGER_SERVICE } from '../shared/types';
import type { LoggerService } from '../shared/types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses the first `{...}` block of a model reply into a RoleMap.
 * Returns null when there is no block or it is not a JSON object.
 */
export function parseRoleMap(raw: string, placeholders: string[]): RoleMap | null {
  const block = raw.match(/\{[\s\S]*\}/);
  if (!block) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(block[0]);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const known = new Set(placeholders);
  const result = emptyRoleMap();

  if (isRecord(parsed.roles)) {
    for (const [role, fields] of Object.entries(parsed.roles)) {
      if (!Array.isArray(fields)) continue;
      const names = fields.filter(
        (f): f is string => typeof f === 'string' && known.has(f),
      );
      if (names.length) result.roles[role] = names;
    }
  }

  if (isRecord(parsed.field_descriptions)) {
    for (const [field, description] of Object.entries(parsed.field_descriptions)) {
      if (typeof description === 'string' && known.has(field) && description.trim()) {
        result.fieldDescriptions[field] = description.trim();
      }
    }
  }

  return result;
}

@Injectable()
export class RoleClassifierService {
  constructor(
    private readonly aiService: AiService,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  async classifyRoles(
    documentText: string,
    placeholders: string[],
    signal?: AbortSignal,
  ): Promise<RoleMap> {
    if (!placeholders.length) return emptyRoleMap();

    const prompt = composeRoleClassification(documentText, placeholders);

    let raw: string;
    try {
      raw = await this.aiService.generate(prompt.system, prompt.user, {
        kind: 'classify_roles',
        signal,
      });
    } catch (error: unknown) {
      if (error instanceof GenerationAbortedError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      await this.logger.warn(`classifyRoles(): generation failed, using empty role map (${message})`);
      return emptyRoleMap();
    }

    const roleMap = parseRoleMap(raw, placeholders);
    if (!roleMap) {
      await this.logger.warn(`classifyRoles(): malformed JSON, using empty role map: ${raw.slice(0, 120)}`);
      return emptyRoleMap();
    }

    await this.logger.debug(`classifyRoles(): ${Object.keys(roleMap.roles).length} role(s)`);
    return roleMap;
  }
}
