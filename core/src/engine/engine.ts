/**
 * Shadowing scoring pipeline.
 *
 * decode -> trim -> normalise (per source) -> embed -> remove bias -> align
 * -> distance -> calibrate, with the waveform preview built from the
 * trimmed, pre-normalisation audio. Each stage consumes the previous
 * stage's full output, so the only concurrency is cancellation between
 * stages.
 */
import {
  AudioSource,
  EmbeddingSequence,
  ScoreResult,
  ScoringObserver,
  SourceRole,
  TimeWindow,
  TrimResult,
  Waveform,
} from '../types';
import { ScoringConfig, ScoringConfigOverrides, resolveScoringConfig } from '../config';
import {
  ModelInferenceError,
  NoVoiceDetectedError,
  SegmentTooShortError,
  throwIfCancelled,
} from '../errors';
import { AudioDecoder } from '../audio/decoder';
import { trim } from '../audio/trim';
import { normalize } from '../audio/normalize';
import { peakAbs, summarizeWaveform } from '../dsp/stats';
import { EmbeddingModel } from '../embedding/model';
import { align, applyLag, maxLagFor, removeBias } from '../scoring/align';
import { scoreDistance } from '../scoring/distance';
import { calibrateScore } from '../scoring/calibrate';
import { buildComparison } from '../scoring/preview';

export interface EngineOptions {
  config?: ScoringConfigOverrides;
  decoder?: AudioDecoder;
  observer?: ScoringObserver;
}

interface PreparedAudio {
  trim: TrimResult;
  normalized: Waveform;
}

export class ShadowingScoringEngine {
  readonly config: ScoringConfig;
  private readonly decoder: AudioDecoder;
  private readonly observer?: ScoringObserver;

  /**
   * @param referenceSource - the long recording reference segments are cut from
   * @param embedder - shared model instance; built once per process
   */
  constructor(
    private readonly referenceSource: AudioSource,
    private readonly embedder: EmbeddingModel,
    options: EngineOptions = {}
  ) {
    this.config = resolveScoringConfig(options.config);
    this.observer = options.observer;
    this.decoder = (options.decoder ?? new AudioDecoder()).withObserver(options.observer);
    if (embedder.sampleRate !== this.config.sampleRate) {
      throw new RangeError(
        `Embedding model runs at ${embedder.sampleRate} Hz but scoring is configured for ${this.config.sampleRate} Hz`
      );
    }
  }

  /**
   * Score a learner recording against the reference segment
   * [referenceStart, referenceEnd] (seconds).
   */
  async score(
    referenceStart: number,
    referenceEnd: number,
    userSource: AudioSource,
    signal?: AbortSignal
  ): Promise<ScoreResult> {
    return this.scoreWindow({ start: referenceStart, end: referenceEnd }, userSource, signal);
  }

  /** As `score`; without a window the whole reference source is used. */
  async scoreWindow(
    referenceWindow: TimeWindow | undefined,
    userSource: AudioSource,
    signal?: AbortSignal
  ): Promise<ScoreResult> {
    const sr = this.config.sampleRate;

    throwIfCancelled(signal, 'reference decode');
    const ref = await this.decoder.decode(this.referenceSource, sr, referenceWindow);
    this.emitDecode('reference', ref.strategy, ref.samples);
    throwIfCancelled(signal, 'reference preparation');
    const preparedRef = this.prepareReference(ref.samples);

    throwIfCancelled(signal, 'recording decode');
    const user = await this.decoder.decode(userSource, sr);
    this.emitDecode('user', user.strategy, user.samples);
    throwIfCancelled(signal, 'recording preparation');
    const preparedUser = this.prepareUser(user.samples);

    return this.compare(preparedRef, preparedUser, signal);
  }

  /**
   * Score two waveforms already decoded at the configured sample rate.
   * Trimming, checks and everything after run as in `score`.
   */
  async scoreWaveforms(reference: Waveform, user: Waveform, signal?: AbortSignal): Promise<ScoreResult> {
    throwIfCancelled(signal, 'reference preparation');
    const preparedRef = this.prepareReference(reference);
    throwIfCancelled(signal, 'recording preparation');
    const preparedUser = this.prepareUser(user);
    return this.compare(preparedRef, preparedUser, signal);
  }

  // -------------------------------------------------------------------------
  // Stages
  // -------------------------------------------------------------------------

  private get minSamples(): number {
    return Math.floor(this.config.sampleRate * this.config.minSegmentSeconds);
  }

  private prepareReference(waveform: Waveform): PreparedAudio {
    const trimmed = this.trimAndReport('reference', waveform);
    const samples = trimmed.trimmedWaveform.length;
    if (samples < this.minSamples) {
      throw new SegmentTooShortError('reference', samples, this.minSamples);
    }
    return { trim: trimmed, normalized: this.normalizeAndReport('reference', trimmed.trimmedWaveform) };
  }

  private prepareUser(waveform: Waveform): PreparedAudio {
    const trimmed = this.trimAndReport('user', waveform);
    // Audibility is checked before length so silence reads as "no voice"
    const peak = peakAbs(trimmed.trimmedWaveform);
    if (peak < this.config.minVoicePeak) {
      throw new NoVoiceDetectedError('user', peak, this.config.minVoicePeak);
    }
    const samples = trimmed.trimmedWaveform.length;
    if (samples < this.minSamples) {
      throw new SegmentTooShortError('user', samples, this.minSamples);
    }
    return { trim: trimmed, normalized: this.normalizeAndReport('user', trimmed.trimmedWaveform) };
  }

  private async compare(ref: PreparedAudio, user: PreparedAudio, signal?: AbortSignal): Promise<ScoreResult> {
    const { config } = this;

    throwIfCancelled(signal, 'reference embedding');
    const refSeq = await this.embed('reference', ref.normalized);
    throwIfCancelled(signal, 'recording embedding');
    const userSeq = await this.embed('user', user.normalized);
    throwIfCancelled(signal, 'alignment');

    const refCentered = removeBias(refSeq);
    const userCentered = removeBias(userSeq);
    const maxLag = maxLagFor(refCentered.length, userCentered.length, config.alignment.maxLagFrames);
    const alignment = align(refCentered, userCentered, maxLag);
    const aligned = applyLag(alignment.lagFrames, refCentered, userCentered);
    const secondsPerFrame = ref.normalized.length / config.sampleRate / Math.max(1, refCentered.length);
    this.observer?.({
      stage: 'align',
      lagFrames: alignment.lagFrames,
      similarity: alignment.similarity,
      maxLag,
      approxOffsetSeconds: alignment.lagFrames * secondsPerFrame,
    });

    throwIfCancelled(signal, 'distance');
    const breakdown = scoreDistance(aligned.ref, aligned.user, alignment.similarity, config.distance);
    this.observer?.({ stage: 'distance', similarity: alignment.similarity, ...breakdown });

    const [refCount, userCount] = config.calibration.durationBasis === 'frames'
      ? [breakdown.refFrameCount, breakdown.userFrameCount]
      : [ref.trim.trimmedWaveform.length, user.trim.trimmedWaveform.length];
    const calibrated = calibrateScore(breakdown.distance, refCount, userCount, config.calibration);
    this.observer?.({ stage: 'score', ...calibrated });

    const { normMaxAbs, ...waveformComparison } = buildComparison(
      ref.trim.trimmedWaveform,
      user.trim.trimmedWaveform,
      config.sampleRate,
      config.preview.bins
    );
    this.observer?.({
      stage: 'preview',
      bins: waveformComparison.reference.perBinMaxima.length,
      normMaxAbs,
      referenceSeconds: waveformComparison.reference.durationSeconds,
      userSeconds: waveformComparison.user.durationSeconds,
    });

    return {
      acousticScore: calibrated.acousticScore,
      meanDistance: breakdown.distance,
      referenceFrameCount: breakdown.refFrameCount,
      userFrameCount: breakdown.userFrameCount,
      waveformComparison,
    };
  }

  private async embed(role: SourceRole, waveform: Waveform): Promise<EmbeddingSequence> {
    const seq = await this.embedder.embedSequence(waveform);
    if (seq.length === 0) {
      throw new ModelInferenceError(`Embedding model returned no frames for the ${role} audio`);
    }
    this.observer?.({ stage: 'embed', role, frames: seq.length, dimension: seq[0]?.length ?? 0 });
    return seq;
  }

  private trimAndReport(role: SourceRole, waveform: Waveform): TrimResult {
    const sr = this.config.sampleRate;
    const result = trim(waveform, sr, this.config.trim);
    if (this.observer) {
      this.observer({
        stage: 'trim',
        role,
        headSeconds: result.startSampleIndex / sr,
        tailSeconds: Math.max(0, waveform.length - 1 - result.endSampleIndex) / sr,
        threshold: result.threshold,
        noiseFloorEnergy: result.noiseFloorEnergy,
        peakEnergy: result.peakEnergy,
        summary: summarizeWaveform(result.trimmedWaveform, sr),
      });
    }
    return result;
  }

  private normalizeAndReport(role: SourceRole, waveform: Waveform): Waveform {
    const { targetRms, maxGain } = this.config.normalize;
    const result = normalize(waveform, targetRms, maxGain);
    this.observer?.({
      stage: 'normalize',
      role,
      rms: result.measuredRMS,
      peak: result.measuredPeak,
      gain: result.appliedGain,
    });
    return result.waveform;
  }

  private emitDecode(role: SourceRole, strategy: string, samples: Waveform): void {
    if (this.observer) {
      this.observer({ stage: 'decode', role, strategy, summary: summarizeWaveform(samples, this.config.sampleRate) });
    }
  }
}
