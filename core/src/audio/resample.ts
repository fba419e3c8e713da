/**
 * Sample-rate conversion for the WAV fast path.
 *
 * Output length is round(n * to / from) and output sample i sits at input
 * position i * from / to. Upsampling interpolates linearly between
 * neighbours; positions past the last input sample hold it. Downsampling
 * runs a Blackman-windowed sinc low-pass centred on each output position,
 * so content above the new Nyquist rate is removed instead of folding back.
 */

/** Low-pass cutoff as a fraction of the output Nyquist rate. */
const ROLLOFF = 0.9;

/** Kernel half-width, in zero crossings of the output-rate sinc. */
const ZERO_CROSSINGS = 8;

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

function blackman(u: number): number {
  return 0.42 + 0.5 * Math.cos(Math.PI * u) + 0.08 * Math.cos(2 * Math.PI * u);
}

function finiteAt(samples: Float32Array, i: number): number {
  const x = samples[i];
  return Number.isFinite(x) ? x : 0;
}

function interpolate(samples: Float32Array, step: number, outLen: number): Float32Array {
  const out = new Float32Array(outLen);
  const last = samples.length - 1;
  for (let i = 0; i < outLen; i++) {
    const pos = i * step;
    const i0 = Math.min(Math.floor(pos), last);
    const i1 = Math.min(i0 + 1, last);
    const frac = pos - i0;
    const a = finiteAt(samples, i0);
    const b = finiteAt(samples, i1);
    out[i] = a + (b - a) * frac;
  }
  return out;
}

function lowPassDecimate(samples: Float32Array, step: number, outLen: number): Float32Array {
  const out = new Float32Array(outLen);
  const last = samples.length - 1;
  const cutoff = ROLLOFF / step;
  const half = ZERO_CROSSINGS * step;

  for (let i = 0; i < outLen; i++) {
    const center = i * step;
    const lo = Math.max(0, Math.ceil(center - half));
    const hi = Math.min(last, Math.floor(center + half));
    let acc = 0;
    let weightSum = 0;
    for (let k = lo; k <= hi; k++) {
      const t = k - center;
      const w = cutoff * sinc(cutoff * t) * blackman(t / half);
      acc += finiteAt(samples, k) * w;
      weightSum += w;
    }
    // Taps are renormalised so DC passes at unit gain, including at the edges
    out[i] = weightSum > 0 ? acc / weightSum : finiteAt(samples, Math.min(Math.round(center), last));
  }
  return out;
}

export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (!(fromRate > 0) || !(toRate > 0)) {
    throw new Error(`Invalid resample rates ${fromRate} -> ${toRate}`);
  }
  if (fromRate === toRate || samples.length === 0) {
    return samples;
  }

  const outLen = Math.round((samples.length * toRate) / fromRate);
  const step = fromRate / toRate;
  return toRate < fromRate
    ? lowPassDecimate(samples, step, outLen)
    : interpolate(samples, step, outLen);
}
