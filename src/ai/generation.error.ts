import { GenerationFailureKind, GenerationKind } from './ai.types';

export class GenerationError extends Error {
  constructor(
    message: string,
    readonly failure: GenerationFailureKind,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

/** Raised when the caller's AbortSignal fired while a call was pending. */
export class GenerationAbortedError extends Error {
  constructor(readonly kind: GenerationKind) {
    super(`Generation call "${kind}" was aborted`);
    this.name = 'GenerationAbortedError';
  }
}
