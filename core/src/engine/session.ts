import { AudioSource, ScoreResult } from '../types';
import { ShadowingScoringEngine } from './engine';

/**
 * One practice session against one reference recording. Submitting a new
 * attempt (the learner re-recorded) cancels the attempt still in flight;
 * the cancelled call rejects with ScoringCancelledError at its next stage
 * boundary.
 */
export class ShadowingSession {
  private inFlight: AbortController | null = null;

  constructor(private readonly engine: ShadowingScoringEngine) {}

  get busy(): boolean {
    return this.inFlight !== null;
  }

  async submit(referenceStart: number, referenceEnd: number, userSource: AudioSource): Promise<ScoreResult> {
    const controller = this.begin();
    try {
      return await this.engine.score(referenceStart, referenceEnd, userSource, controller.signal);
    } finally {
      this.end(controller);
    }
  }

  /** Abort whatever attempt is running, if any. */
  cancel(): void {
    this.inFlight?.abort();
    this.inFlight = null;
  }

  private begin(): AbortController {
    this.cancel();
    const controller = new AbortController();
    this.inFlight = controller;
    return controller;
  }

  private end(controller: AbortController): void {
    if (this.inFlight === controller) {
      this.inFlight = null;
    }
  }
}
