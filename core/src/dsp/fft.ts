/**
 * Short-time power spectra for the spectral embedder.
 */

export function nextPow2(n: number): number {
  let size = 1;
  while (size < n) size <<= 1;
  return size;
}

export function hannWindow(length: number): Float64Array {
  const win = new Float64Array(length);
  if (length === 1) {
    win[0] = 1;
    return win;
  }
  for (let i = 0; i < length; i++) {
    win[i] = 0.5 * (1 - Math.cos(2 * Math.PI * i / (length - 1)));
  }
  return win;
}

function bitReversalTable(size: number): Uint32Array {
  const table = new Uint32Array(size);
  let bits = 0;
  while ((1 << bits) < size) bits++;
  for (let i = 0; i < size; i++) {
    let r = 0;
    for (let b = 0; b < bits; b++) {
      if (i & (1 << b)) r |= 1 << (bits - 1 - b);
    }
    table[i] = r;
  }
  return table;
}

/**
 * Hann-windowed power spectrum |X(k)|^2, k in [0, fftSize/2], of frames
 * cut from a waveform. Window, bit-reversal order and twiddle factors are
 * built once; the scratch buffers are reused, so one instance must not be
 * shared between concurrent callers.
 */
export class PowerSpectrum {
  readonly fftSize: number;
  readonly bins: number;
  private readonly window: Float64Array;
  private readonly order: Uint32Array;
  private readonly cos: Float64Array;
  private readonly sin: Float64Array;
  private readonly re: Float64Array;
  private readonly im: Float64Array;

  constructor(readonly frameLength: number) {
    this.fftSize = nextPow2(frameLength);
    this.bins = (this.fftSize >> 1) + 1;
    this.window = hannWindow(frameLength);
    this.order = bitReversalTable(this.fftSize);

    const half = this.fftSize >> 1;
    this.cos = new Float64Array(half);
    this.sin = new Float64Array(half);
    for (let k = 0; k < half; k++) {
      const angle = (-2 * Math.PI * k) / this.fftSize;
      this.cos[k] = Math.cos(angle);
      this.sin[k] = Math.sin(angle);
    }
    this.re = new Float64Array(this.fftSize);
    this.im = new Float64Array(this.fftSize);
  }

  /**
   * Spectrum of the frame starting at `start`. Samples past the end of the
   * input, and non-finite samples, read as zero.
   */
  frame(samples: Float32Array, start: number): Float64Array {
    const { re, im, order, window } = this;
    const n = this.fftSize;

    // Load the windowed frame straight into bit-reversed positions
    re.fill(0);
    im.fill(0);
    for (let i = 0; i < this.frameLength; i++) {
      const idx = start + i;
      const x = idx < samples.length ? samples[idx] : 0;
      re[order[i]] = Number.isFinite(x) ? x * window[i] : 0;
    }

    for (let len = 2; len <= n; len <<= 1) {
      const halfLen = len >> 1;
      const stride = n / len;
      for (let base = 0; base < n; base += len) {
        for (let k = 0; k < halfLen; k++) {
          const wRe = this.cos[k * stride];
          const wIm = this.sin[k * stride];
          const even = base + k;
          const odd = even + halfLen;
          const tRe = wRe * re[odd] - wIm * im[odd];
          const tIm = wRe * im[odd] + wIm * re[odd];
          re[odd] = re[even] - tRe;
          im[odd] = im[even] - tIm;
          re[even] += tRe;
          im[even] += tIm;
        }
      }
    }

    const power = new Float64Array(this.bins);
    for (let k = 0; k < this.bins; k++) {
      power[k] = re[k] * re[k] + im[k] * im[k];
    }
    return power;
  }
}
