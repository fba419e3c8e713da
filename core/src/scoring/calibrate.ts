import { CalibrationOptions, DEFAULT_SCORING_CONFIG } from '../config';
import { clamp } from '../dsp/stats';

type Calibration = Pick<CalibrationOptions, 'dGood' | 'dBad' | 'durationLow' | 'durationHigh'>;

/** Linear map of distance to 0..100: dGood and below is 100, dBad and above is 0. */
export function baseScore(distance: number, options: Calibration = DEFAULT_SCORING_CONFIG.calibration): number {
  if (!Number.isFinite(distance)) return 0;
  const s = (100 * (options.dBad - distance)) / (options.dBad - options.dGood);
  return clamp(s, 0, 100);
}

/**
 * 1 inside [durationLow, durationHigh] (inclusive), falling off linearly
 * below and as high/ratio above.
 */
export function durationFactor(ratio: number, options: Calibration = DEFAULT_SCORING_CONFIG.calibration): number {
  if (Number.isNaN(ratio)) return 0;
  if (ratio < options.durationLow) {
    return Math.max(0, ratio / options.durationLow);
  }
  if (ratio > options.durationHigh) {
    return Math.max(0, options.durationHigh / ratio);
  }
  return 1;
}

export function durationRatio(refCount: number, userCount: number): number {
  return refCount === 0 ? 1 : userCount / refCount;
}

export interface CalibratedScore {
  baseScore: number;
  durationRatio: number;
  durationFactor: number;
  acousticScore: number;
}

/**
 * Final 0..100 score for a blended distance, with the terms it was built
 * from. `refCount` and `userCount` measure the two attempts in the same
 * unit (frames or samples).
 */
export function calibrateScore(
  distance: number,
  refCount: number,
  userCount: number,
  options: Calibration = DEFAULT_SCORING_CONFIG.calibration
): CalibratedScore {
  const base = baseScore(distance, options);
  const ratio = durationRatio(refCount, userCount);
  const factor = durationFactor(ratio, options);
  return {
    baseScore: base,
    durationRatio: ratio,
    durationFactor: factor,
    acousticScore: clamp(base * factor, 0, 100),
  };
}

export function calibrate(
  distance: number,
  refCount: number,
  userCount: number,
  options: Calibration = DEFAULT_SCORING_CONFIG.calibration
): number {
  return calibrateScore(distance, refCount, userCount, options).acousticScore;
}
