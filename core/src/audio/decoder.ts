/**
 * Audio decoding to mono float PCM at a target sample rate.
 *
 * Two strategies are tried in order: the in-process WAV reader (fast path)
 * and, if it throws for any reason, the ffmpeg frame reader. If both fail
 * the request fails with DecodeFailureError carrying both causes.
 */
import fs from 'fs-extra';
import { AudioSource, ScoringObserver, TimeWindow, Waveform } from '../types';
import { DecodeFailureError, describeError } from '../errors';
import { parseWav, readMonoFrames } from './wav';
import { resample } from './resample';
import { FfmpegDecoder, FfmpegDecoderOptions } from './ffmpeg';

export interface DecodeStrategy {
  readonly name: string;
  /**
   * `window`, when given, is already clamped to start >= 0 and end > start;
   * strategies clamp its end to the source duration.
   */
  decode(source: AudioSource, sampleRate: number, window?: TimeWindow): Promise<Waveform>;
}

export interface DecodedAudio {
  samples: Waveform;
  sampleRate: number;
  strategy: string;
}

export interface AudioDecoderOptions {
  fast?: DecodeStrategy;
  fallback?: DecodeStrategy;
  ffmpeg?: FfmpegDecoderOptions;
  observer?: ScoringObserver;
}

export function describeSource(source: AudioSource): string {
  return typeof source === 'string' ? source : `<buffer ${source.length} bytes>`;
}

/**
 * Clamp a requested window to start >= 0. Returns null when the window
 * collapses to zero or negative length.
 */
export function clampWindow(window: TimeWindow): TimeWindow | null {
  if (!Number.isFinite(window.start) || Number.isNaN(window.end) || window.end === -Infinity) {
    throw new RangeError(`Time window must have a finite start and an end, got ${window.start}..${window.end}`);
  }
  const start = Math.max(0, window.start);
  const end = Math.max(start, window.end);
  if (end <= start) return null;
  return { start, end };
}

export class WavDecoder implements DecodeStrategy {
  readonly name = 'wav';

  async decode(source: AudioSource, sampleRate: number, window?: TimeWindow): Promise<Waveform> {
    const bytes = typeof source === 'string' ? await fs.readFile(source) : source;
    const info = parseWav(bytes);

    let startFrame = 0;
    let endFrame = info.frameCount;
    if (window) {
      // Segment timestamps may run past the file; truncate rather than fail
      startFrame = Math.min(Math.floor(window.start * info.sampleRate), info.frameCount);
      endFrame = Math.max(startFrame, Math.min(Math.floor(window.end * info.sampleRate), info.frameCount));
    }
    if (endFrame <= startFrame) {
      return new Float32Array(0);
    }

    const mono = readMonoFrames(info, startFrame, endFrame);
    return resample(mono, info.sampleRate, sampleRate);
  }
}

export class AudioDecoder {
  private readonly fast: DecodeStrategy;
  private readonly fallback: DecodeStrategy;
  private readonly observer?: ScoringObserver;

  constructor(options: AudioDecoderOptions = {}) {
    this.fast = options.fast ?? new WavDecoder();
    this.fallback = options.fallback ?? new FfmpegDecoder(options.ffmpeg);
    this.observer = options.observer;
  }

  /** A copy of this decoder reporting to a different observer. */
  withObserver(observer: ScoringObserver | undefined): AudioDecoder {
    return new AudioDecoder({ fast: this.fast, fallback: this.fallback, observer });
  }

  async decode(source: AudioSource, targetSampleRate: number, window?: TimeWindow): Promise<DecodedAudio> {
    let clamped: TimeWindow | undefined;
    if (window) {
      const w = clampWindow(window);
      if (!w) {
        return { samples: new Float32Array(0), sampleRate: targetSampleRate, strategy: 'none' };
      }
      clamped = w;
    }

    let primaryError: unknown;
    try {
      const samples = await this.fast.decode(source, targetSampleRate, clamped);
      return { samples, sampleRate: targetSampleRate, strategy: this.fast.name };
    } catch (err) {
      primaryError = err;
      this.observer?.({ stage: 'decode-fallback', strategy: this.fallback.name, error: describeError(err) });
    }

    try {
      const samples = await this.fallback.decode(source, targetSampleRate, clamped);
      return { samples, sampleRate: targetSampleRate, strategy: this.fallback.name };
    } catch (err) {
      throw new DecodeFailureError(describeSource(source), primaryError, err);
    }
  }
}

/** Decode with the default strategies. */
export async function decode(source: AudioSource, targetSampleRate: number, window?: TimeWindow): Promise<Waveform> {
  const decoded = await new AudioDecoder().decode(source, targetSampleRate, window);
  return decoded.samples;
}
