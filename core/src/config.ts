/**
 * Scoring configuration.
 *
 * The calibration constants were tuned empirically against one embedding
 * model. They are kept as named, overridable values; a different model
 * needs its own dGood/dBad and similarity gate.
 */

export interface TrimOptions {
  frameMs: number;
  hopMs: number;
  thresholdRatio: number;
  minActiveFrames: number;
  paddingMs: number;
  baseThreshold: number;
}

export interface NormalizeOptions {
  targetRms: number;
  maxGain: number;
}

export interface AlignmentOptions {
  /** Upper bound on the lag search, in frames. */
  maxLagFrames: number;
}

export interface DistanceOptions {
  /** Sakoe-Chiba half-width as a fraction of max(T, U). */
  bandRatio: number;
  /** Weight of the DTW distance in the blend; the strict distance gets the rest. */
  dtwWeight: number;
  simGate: number;
  simPenaltyMax: number;
  /** Frame count at which the similarity penalty reaches full weight. */
  penaltyFullFrames: number;
}

export type DurationBasis = 'samples' | 'frames';

export interface CalibrationOptions {
  dGood: number;
  dBad: number;
  durationLow: number;
  durationHigh: number;
  durationBasis: DurationBasis;
}

export interface PreviewOptions {
  bins: number;
}

export interface ScoringConfig {
  sampleRate: number;
  minSegmentSeconds: number;
  minVoicePeak: number;
  trim: TrimOptions;
  normalize: NormalizeOptions;
  alignment: AlignmentOptions;
  distance: DistanceOptions;
  calibration: CalibrationOptions;
  preview: PreviewOptions;
}

export type ScoringConfigOverrides = {
  [K in keyof ScoringConfig]?: ScoringConfig[K] extends object
    ? Partial<ScoringConfig[K]>
    : ScoringConfig[K];
};

export const DEFAULT_TRIM_OPTIONS: TrimOptions = {
  frameMs: 20,
  hopMs: 10,
  thresholdRatio: 0.06,
  minActiveFrames: 2,
  paddingMs: 40,
  baseThreshold: 0.003,
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  sampleRate: 16000,
  minSegmentSeconds: 0.25,
  minVoicePeak: 0.02,
  trim: DEFAULT_TRIM_OPTIONS,
  normalize: { targetRms: 0.1, maxGain: 12 },
  alignment: { maxLagFrames: 12 },
  distance: {
    bandRatio: 0.35,
    dtwWeight: 0.8,
    simGate: 0.14,
    simPenaltyMax: 0.18,
    penaltyFullFrames: 20,
  },
  calibration: {
    dGood: 0.71,
    dBad: 1.18,
    durationLow: 0.6,
    durationHigh: 1.6,
    durationBasis: 'samples',
  },
  preview: { bins: 240 },
};

export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  const base = DEFAULT_SCORING_CONFIG;
  const config: ScoringConfig = {
    sampleRate: overrides.sampleRate ?? base.sampleRate,
    minSegmentSeconds: overrides.minSegmentSeconds ?? base.minSegmentSeconds,
    minVoicePeak: overrides.minVoicePeak ?? base.minVoicePeak,
    trim: { ...base.trim, ...overrides.trim },
    normalize: { ...base.normalize, ...overrides.normalize },
    alignment: { ...base.alignment, ...overrides.alignment },
    distance: { ...base.distance, ...overrides.distance },
    calibration: { ...base.calibration, ...overrides.calibration },
    preview: { ...base.preview, ...overrides.preview },
  };

  if (!(config.sampleRate > 0)) {
    throw new RangeError(`sampleRate must be positive, got ${config.sampleRate}`);
  }
  if (!(config.calibration.dBad > config.calibration.dGood)) {
    throw new RangeError(
      `calibration.dBad (${config.calibration.dBad}) must exceed dGood (${config.calibration.dGood})`
    );
  }
  if (!(config.calibration.durationLow > 0) || config.calibration.durationHigh < config.calibration.durationLow) {
    throw new RangeError('calibration duration bounds must satisfy 0 < durationLow <= durationHigh');
  }
  if (!(config.distance.simGate > 0)) {
    throw new RangeError(`distance.simGate must be positive, got ${config.distance.simGate}`);
  }
  return config;
}
