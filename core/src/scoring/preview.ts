/**
 * Min/max waveform previews for side-by-side display. Both previews share
 * one scale: the louder source reaches full height.
 */
import { Waveform, WaveformComparison } from '../types';

interface MinMaxBins {
  mins: number[];
  maxs: number[];
  maxAbs: number;
}

export function downsampleMinMax(waveform: Waveform, bins: number): MinMaxBins {
  const binCount = Math.max(1, Math.floor(bins));
  const mins: number[] = [];
  const maxs: number[] = [];
  let maxAbs = 0;
  const total = waveform.length;

  for (let b = 0; b < binCount; b++) {
    const start = Math.floor((b * total) / binCount);
    const rawEnd = Math.floor(((b + 1) * total) / binCount);
    const end = Math.min(total, Math.max(start + 1, rawEnd));

    let mn = Infinity;
    let mx = -Infinity;
    for (let i = start; i < end; i++) {
      const x = waveform[i];
      if (!Number.isFinite(x)) continue;
      if (x < mn) mn = x;
      if (x > mx) mx = x;
    }
    if (mn === Infinity || mx === -Infinity) {
      mn = 0;
      mx = 0;
    }

    mins.push(mn);
    maxs.push(mx);
    const absMax = Math.max(Math.abs(mn), Math.abs(mx));
    if (absMax > maxAbs) maxAbs = absMax;
  }

  return { mins, maxs, maxAbs };
}

export function buildComparison(
  refWaveform: Waveform,
  userWaveform: Waveform,
  sampleRate: number,
  bins = 240
): WaveformComparison & { normMaxAbs: number } {
  const ref = downsampleMinMax(refWaveform, bins);
  const user = downsampleMinMax(userWaveform, bins);
  const denom = Math.max(1e-6, ref.maxAbs, user.maxAbs);

  return {
    reference: {
      perBinMinima: ref.mins.map((v) => v / denom),
      perBinMaxima: ref.maxs.map((v) => v / denom),
      durationSeconds: refWaveform.length / sampleRate,
    },
    user: {
      perBinMinima: user.mins.map((v) => v / denom),
      perBinMaxima: user.maxs.map((v) => v / denom),
      durationSeconds: userWaveform.length / sampleRate,
    },
    normMaxAbs: denom,
  };
}
