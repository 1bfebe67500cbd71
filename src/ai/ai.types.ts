export type GenerationKind =
  | 'clarify'
  | 'draft'
  | 'review'
  | 'amend'
  | 'classify_roles';

export interface GenerationProfile {
  temperature: number;
  maxTokens: number;
  jsonMode?: boolean;
}

// fixed request parameters per call kind
export const GENERATION_PROFILES: Record<GenerationKind, GenerationProfile> = {
  clarify: { temperature: 0.3, maxTokens: 150 },
  draft: { temperature: 0.2, maxTokens: 3000 },
  review: { temperature: 0.2, maxTokens: 600 },
  amend: { temperature: 0.3, maxTokens: 3500 },
  classify_roles: { temperature: 0, maxTokens: 700, jsonMode: true },
};

export interface GenerationOptions {
  kind?: GenerationKind;
  signal?: AbortSignal;
}

export type GenerationFailureKind =
  | 'timeout'
  | 'network'
  | 'rate_limit'
  | 'api'
  | 'empty';
