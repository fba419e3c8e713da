/**
 * Statistical helpers for sample and envelope arrays.
 * Non-finite samples count as silence wherever values are aggregated.
 */
import { WaveformSummary } from '../types';

type NumericArray = Float32Array | Float64Array | number[];

export function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}

/** Largest |x| over the finite samples. */
export function peakAbs(arr: NumericArray): number {
  let peak = 0;
  for (let i = 0; i < arr.length; i++) {
    const x = arr[i];
    if (!Number.isFinite(x)) continue;
    const ax = Math.abs(x);
    if (ax > peak) peak = ax;
  }
  return peak;
}

/** Root mean square over the finite samples. */
export function rms(arr: NumericArray): number {
  let sumSq = 0;
  let n = 0;
  for (let i = 0; i < arr.length; i++) {
    const x = arr[i];
    if (!Number.isFinite(x)) continue;
    sumSq += x * x;
    n++;
  }
  return n > 0 ? Math.sqrt(sumSq / n) : 0;
}

/** Mean |x| over the finite samples of arr[start, end). */
export function meanAbs(arr: NumericArray, start: number, end: number): number {
  const stop = Math.min(arr.length, end);
  let sum = 0;
  let n = 0;
  for (let i = Math.max(0, start); i < stop; i++) {
    const x = arr[i];
    if (!Number.isFinite(x)) continue;
    sum += Math.abs(x);
    n++;
  }
  return n > 0 ? sum / n : 0;
}

/**
 * Lower-rank percentile: the element at floor((n - 1) * p / 100) of the
 * sorted values. No interpolation between neighbours.
 */
export function lowerPercentile(arr: NumericArray, p: number): number {
  if (arr.length === 0) return 0;
  const sorted = Float64Array.from(arr).sort();
  const idx = clamp(Math.floor((sorted.length - 1) * (p / 100)), 0, sorted.length - 1);
  return sorted[idx];
}

export function summarizeWaveform(samples: NumericArray, sampleRate: number): WaveformSummary {
  let nonFinite = 0;
  for (let i = 0; i < samples.length; i++) {
    if (!Number.isFinite(samples[i])) nonFinite++;
  }
  return {
    samples: samples.length,
    seconds: sampleRate > 0 ? samples.length / sampleRate : 0,
    maxAbs: peakAbs(samples),
    rms: rms(samples),
    nonFiniteCount: nonFinite,
  };
}
