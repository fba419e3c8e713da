import { SourceRole } from './types';

export type ShadowingErrorCode =
  | 'DECODE_FAILURE'
  | 'SEGMENT_TOO_SHORT'
  | 'NO_VOICE_DETECTED'
  | 'MODEL_INFERENCE_FAILURE'
  | 'INTERNAL_INVARIANT'
  | 'CANCELLED';

/**
 * Base class for every failure the scoring pipeline raises. All of them
 * are request-scoped: they abort the current call and nothing else.
 */
export class ShadowingError extends Error {
  readonly code: ShadowingErrorCode;

  constructor(code: ShadowingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  /** True for failures the learner can fix by recording again. */
  get userActionable(): boolean {
    return this.code === 'SEGMENT_TOO_SHORT' || this.code === 'NO_VOICE_DETECTED';
  }
}

export class DecodeFailureError extends ShadowingError {
  constructor(
    readonly source: string,
    readonly primary: unknown,
    readonly fallback: unknown
  ) {
    super(
      'DECODE_FAILURE',
      `Failed to decode ${source}. fast path: ${describeError(primary)}; fallback: ${describeError(fallback)}`
    );
  }
}

export class SegmentTooShortError extends ShadowingError {
  constructor(
    readonly role: SourceRole,
    readonly samples: number,
    readonly minSamples: number
  ) {
    super(
      'SEGMENT_TOO_SHORT',
      role === 'reference'
        ? 'Reference segment too short to score'
        : 'Recording too short, try again'
    );
  }
}

export class NoVoiceDetectedError extends ShadowingError {
  constructor(
    readonly role: SourceRole,
    readonly peak: number,
    readonly minPeak: number
  ) {
    super('NO_VOICE_DETECTED', 'No clear voice was recorded, try again');
  }
}

export class ModelInferenceError extends ShadowingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MODEL_INFERENCE_FAILURE', message, options);
  }
}

export class InternalInvariantError extends ShadowingError {
  constructor(message: string) {
    super('INTERNAL_INVARIANT', message);
  }
}

export class ScoringCancelledError extends ShadowingError {
  constructor(stage: string) {
    super('CANCELLED', `Scoring cancelled before ${stage}`);
  }
}

/** Throws ScoringCancelledError if the signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new ScoringCancelledError(stage);
  }
}

/**
 * One-line rendering of an error and its cause chain, e.g.
 * `DecodeFailureError(DECODE_FAILURE) ... <- Error: spawn ffmpeg ENOENT`.
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  let depth = 0;
  while (current !== undefined && current !== null && depth < 4) {
    if (current instanceof ShadowingError) {
      parts.push(`${current.name}(${current.code}) ${current.message}`);
    } else if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
    } else {
      parts.push(String(current));
      break;
    }
    current = current.cause;
    depth++;
  }
  return parts.join(' <- ');
}
