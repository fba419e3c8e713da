/**
 * Leading/trailing silence removal with an adaptive energy threshold.
 */
import { TrimResult, Waveform } from '../types';
import { DEFAULT_TRIM_OPTIONS, TrimOptions } from '../config';
import { lowerPercentile, meanAbs } from '../dsp/stats';

/**
 * Noise floor estimate: the 20th percentile of the energy envelope. A clip
 * whose quiet frames sit above 70% of its loudest is treated as all speech
 * (floor 0).
 */
export function estimateNoiseFloor(envelope: number[], peakEnergy: number): number {
  if (envelope.length === 0 || peakEnergy <= 1e-6) return 0;
  const p20 = lowerPercentile(envelope, 20);
  if (p20 / peakEnergy > 0.7) return 0;
  return p20;
}

export function adaptiveThreshold(
  noiseFloor: number,
  peakEnergy: number,
  thresholdRatio: number,
  baseThreshold: number
): number {
  const dynamic = Math.max(0, peakEnergy - noiseFloor);
  const fromEnvelope = noiseFloor > 0 && dynamic > 1e-6
    ? noiseFloor + dynamic * thresholdRatio
    : peakEnergy * thresholdRatio;
  return Math.max(baseThreshold, fromEnvelope);
}

export function trim(
  waveform: Waveform,
  sampleRate: number,
  options: Partial<TrimOptions> = {}
): TrimResult {
  const opts = { ...DEFAULT_TRIM_OPTIONS, ...options };
  const n = waveform.length;
  if (n === 0) {
    return {
      trimmedWaveform: new Float32Array(0),
      startSampleIndex: 0,
      endSampleIndex: -1,
      threshold: opts.baseThreshold,
      noiseFloorEnergy: 0,
      peakEnergy: 0,
    };
  }

  const frame = Math.max(1, Math.floor((sampleRate * opts.frameMs) / 1000));
  const hop = Math.max(1, Math.floor((sampleRate * opts.hopMs) / 1000));
  const pad = Math.max(0, Math.floor((sampleRate * opts.paddingMs) / 1000));
  const needFrames = Math.max(1, opts.minActiveFrames);
  const energyAt = (start: number) => meanAbs(waveform, start, start + frame);

  // Pass 1: energy envelope
  const envelope: number[] = [];
  let peakEnergy = 0;
  for (let s = 0; s < n; s += hop) {
    const e = energyAt(s);
    if (e > peakEnergy) peakEnergy = e;
    envelope.push(e);
    if (s + frame >= n) break;
  }
  const noiseFloorEnergy = estimateNoiseFloor(envelope, peakEnergy);
  const threshold = adaptiveThreshold(noiseFloorEnergy, peakEnergy, opts.thresholdRatio, opts.baseThreshold);

  const untrimmed: TrimResult = {
    trimmedWaveform: waveform,
    startSampleIndex: 0,
    endSampleIndex: n - 1,
    threshold,
    noiseFloorEnergy,
    peakEnergy,
  };

  // Pass 2: first run of active frames from the head
  let startSample: number | null = null;
  let active = 0;
  for (let s = 0; s < n; s += hop) {
    if (energyAt(s) >= threshold) {
      active++;
      if (active >= needFrames) {
        startSample = s - (needFrames - 1) * hop;
        break;
      }
    } else {
      active = 0;
    }
    if (s + frame >= n) break;
  }

  // Pass 3: same from the tail
  let endSample: number | null = null;
  active = 0;
  for (let s = Math.max(0, n - frame); ; s = Math.max(0, s - hop)) {
    if (energyAt(s) >= threshold) {
      active++;
      if (active >= needFrames) {
        endSample = s + (needFrames - 1) * hop + frame;
        break;
      }
    } else {
      active = 0;
    }
    if (s === 0) break;
  }

  if (startSample === null || endSample === null) {
    return untrimmed;
  }

  const start = Math.max(0, startSample - pad);
  const end = Math.min(n, endSample + pad) - 1;
  if (end <= start) {
    return untrimmed;
  }

  return {
    ...untrimmed,
    trimmedWaveform: waveform.slice(start, end + 1),
    startSampleIndex: start,
    endSampleIndex: end,
  };
}
