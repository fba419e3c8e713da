/**
 * Embedding model boundary.
 *
 * The scoring pipeline sees two operations only. Everything stateful about
 * an inference runtime (session handles, caches, warm-up) stays private to
 * one instance, which is built once and reused across scoring calls.
 */
import { EmbeddingSequence, Waveform } from '../types';
import { ModelInferenceError, ShadowingError, describeError } from '../errors';
import { InferenceLock } from './lock';

export interface EmbeddingModel {
  readonly sampleRate: number;
  /** One unit-length vector for a single analysis window. */
  embedWindow(window: Waveform): Promise<Float32Array>;
  /** Unit-length frame vectors for a whole utterance. */
  embedSequence(waveform: Waveform): Promise<EmbeddingSequence>;
}

export interface BaseEmbeddingModelOptions {
  sampleRate?: number;
  /** Inputs shorter than this are padded with trailing silence. */
  minSamples?: number;
}

export function l2Normalize(v: ArrayLike<number>): Float32Array {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  const norm = Math.sqrt(sum) + 1e-8;
  const out = new Float32Array(v.length);
  for (let i = 0; i < v.length; i++) out[i] = v[i] / norm;
  return out;
}

export function padToLength(waveform: Waveform, length: number): Waveform {
  if (waveform.length >= length) return waveform;
  const out = new Float32Array(length);
  out.set(waveform);
  return out;
}

/**
 * Shared behaviour for concrete models: padding, the zero-frame retry,
 * per-frame normalisation, a fixed output dimension and one inference in
 * flight per instance. Subclasses implement `infer` only.
 */
export abstract class BaseEmbeddingModel implements EmbeddingModel {
  readonly sampleRate: number;
  readonly minSamples: number;
  private readonly lock = new InferenceLock();
  private dimension: number | null = null;
  private warmedUp = false;

  constructor(options: BaseEmbeddingModelOptions = {}) {
    this.sampleRate = options.sampleRate ?? 16000;
    this.minSamples = options.minSamples ?? this.sampleRate;
  }

  /** Raw frame vectors for a (padded) waveform. May return zero frames. */
  protected abstract infer(waveform: Waveform): Promise<ArrayLike<number>[]>;

  /** Output dimensionality, once the first inference has fixed it. */
  get outputDimension(): number | null {
    return this.dimension;
  }

  get isWarmedUp(): boolean {
    return this.warmedUp;
  }

  /** Runs one inference on silence so later calls skip initialisation cost. */
  async warmup(): Promise<void> {
    if (this.warmedUp) return;
    await this.lock.run(() => this.inferChecked(new Float32Array(this.minSamples)));
    this.warmedUp = true;
  }

  async embedWindow(window: Waveform): Promise<Float32Array> {
    if (window.length === 0) {
      throw new ModelInferenceError('Invalid window length 0');
    }
    const frames = await this.lock.run(() => this.inferChecked(window));
    if (frames.length === 0) {
      throw new ModelInferenceError(`Model produced no frames for a ${window.length}-sample window`);
    }
    if (frames.length === 1) return frames[0];

    // Several frames for one window: mean-pool, then renormalise
    const pooled = new Float64Array(frames[0].length);
    for (const frame of frames) {
      for (let i = 0; i < pooled.length; i++) pooled[i] += frame[i];
    }
    return l2Normalize(pooled);
  }

  async embedSequence(waveform: Waveform): Promise<EmbeddingSequence> {
    return this.lock.run(async () => {
      let input = padToLength(waveform, this.minSamples);
      let frames = await this.inferChecked(input);
      if (frames.length === 0) {
        input = padToLength(input, this.minSamples * 2);
        frames = await this.inferChecked(input);
      }
      if (frames.length === 0) {
        throw new ModelInferenceError(
          `Model produced no frames for ${waveform.length} samples, even after padding to ${input.length}`
        );
      }
      return frames;
    });
  }

  private async inferChecked(waveform: Waveform): Promise<Float32Array[]> {
    let raw: ArrayLike<number>[];
    try {
      raw = await this.infer(waveform);
    } catch (err) {
      if (err instanceof ShadowingError) throw err;
      throw new ModelInferenceError(`Inference failed: ${describeError(err)}`, { cause: err });
    }

    const frames: Float32Array[] = [];
    for (const vector of raw) {
      if (this.dimension === null) {
        if (vector.length === 0) {
          throw new ModelInferenceError('Model produced an empty frame vector');
        }
        this.dimension = vector.length;
      } else if (vector.length !== this.dimension) {
        throw new ModelInferenceError(
          `Model frame has dimension ${vector.length}, expected ${this.dimension}`
        );
      }
      frames.push(l2Normalize(vector));
    }
    return frames;
  }
}
