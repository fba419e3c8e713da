import { NormalizedAudio, Waveform } from '../types';
import { peakAbs, rms } from '../dsp/stats';

const SILENCE_LEVEL = 1e-6;
const CLIP_CEILING = 0.98;

function zeroNonFinite(waveform: Waveform): Waveform {
  for (let i = 0; i < waveform.length; i++) {
    if (!Number.isFinite(waveform[i])) {
      return waveform.map((x) => (Number.isFinite(x) ? x : 0));
    }
  }
  return waveform;
}

/**
 * Rescale toward a target RMS. Gain is clamped to [1/maxGain, maxGain] and
 * then so that the peak lands at or below 0.98. Silent input, and gains
 * within 1% of unity, leave the samples as they are.
 */
export function normalize(waveform: Waveform, targetRms = 0.1, maxGain = 12): NormalizedAudio {
  const measuredRMS = rms(waveform);
  const measuredPeak = peakAbs(waveform);
  const unchanged: NormalizedAudio = {
    waveform: zeroNonFinite(waveform),
    measuredRMS,
    measuredPeak,
    appliedGain: 1,
  };

  if (measuredRMS <= SILENCE_LEVEL || measuredPeak <= SILENCE_LEVEL) {
    return unchanged;
  }

  let gain = targetRms / measuredRMS;
  gain = Math.min(maxGain, Math.max(1 / maxGain, gain));
  gain = Math.min(gain, CLIP_CEILING / measuredPeak);

  if (Math.abs(gain - 1) < 0.01) {
    return unchanged;
  }

  const out = new Float32Array(waveform.length);
  for (let i = 0; i < waveform.length; i++) {
    const x = waveform[i];
    out[i] = Number.isFinite(x) ? Math.min(1, Math.max(-1, x * gain)) : 0;
  }
  return { waveform: out, measuredRMS, measuredPeak, appliedGain: gain };
}
