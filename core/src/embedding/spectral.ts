/**
 * In-process log-mel frame embedder.
 *
 * A deterministic stand-in for a learned speech embedding: each 25 ms
 * Hann-windowed frame (20 ms hop) becomes the log energies of a mel
 * filterbank. It needs no model file and no service, which makes it the
 * default for the CLI and the model the pipeline tests run against.
 */
import { Waveform } from '../types';
import { PowerSpectrum } from '../dsp/fft';
import { BaseEmbeddingModel, BaseEmbeddingModelOptions } from './model';

export interface SpectralEmbedderOptions extends BaseEmbeddingModelOptions {
  frameLength?: number;
  hopLength?: number;
  nMels?: number;
  fMin?: number;
  fMax?: number;
}

const LOG_FLOOR = 1e-10;

export function melFilterbank(
  sr: number,
  nFft: number,
  nMels: number,
  fMin = 0,
  fMax = sr / 2
): Float64Array[] {
  const hzToMel = (hz: number) => 2595.0 * Math.log10(1.0 + hz / 700.0);
  const melToHz = (mel: number) => 700.0 * (Math.pow(10, mel / 2595.0) - 1.0);

  const nBins = Math.floor(nFft / 2) + 1;
  const lowMel = hzToMel(fMin);
  const highMel = hzToMel(fMax);

  const binPoints = new Int32Array(nMels + 2);
  for (let i = 0; i < nMels + 2; i++) {
    const mel = lowMel + (i * (highMel - lowMel)) / (nMels + 1);
    binPoints[i] = Math.floor((nFft + 1) * melToHz(mel) / sr);
  }

  const fb: Float64Array[] = [];
  for (let m = 1; m <= nMels; m++) {
    const row = new Float64Array(nBins);
    const fLeft = binPoints[m - 1];
    const fCenter = binPoints[m];
    const fRight = binPoints[m + 1];
    for (let k = fLeft; k < fCenter && k < nBins; k++) {
      row[k] = (k - fLeft) / (fCenter - fLeft);
    }
    for (let k = fCenter; k < fRight && k < nBins; k++) {
      row[k] = (fRight - k) / (fRight - fCenter);
    }
    fb.push(row);
  }
  return fb;
}

export class SpectralEmbedder extends BaseEmbeddingModel {
  readonly frameLength: number;
  readonly hopLength: number;
  readonly nMels: number;
  private readonly fMin: number;
  private readonly fMax: number;
  private spectrum: PowerSpectrum | null = null;
  private filterbank: Float64Array[] | null = null;

  constructor(options: SpectralEmbedderOptions = {}) {
    super(options);
    this.frameLength = options.frameLength ?? Math.round(this.sampleRate * 0.025);
    this.hopLength = options.hopLength ?? Math.round(this.sampleRate * 0.02);
    this.nMels = options.nMels ?? 40;
    this.fMin = options.fMin ?? 60;
    this.fMax = options.fMax ?? Math.min(7600, this.sampleRate / 2);
    if (this.frameLength <= 0 || this.hopLength <= 0 || this.nMels <= 0) {
      throw new RangeError('frameLength, hopLength and nMels must be positive');
    }
  }

  /** Frames produced for an input of `samples` length (before padding). */
  frameCount(samples: number): number {
    if (samples < this.frameLength) return 0;
    return Math.floor((samples - this.frameLength) / this.hopLength) + 1;
  }

  protected async infer(waveform: Waveform): Promise<Float64Array[]> {
    const { spectrum, filterbank } = this.ensureTables();
    const count = this.frameCount(waveform.length);

    const frames: Float64Array[] = [];
    for (let t = 0; t < count; t++) {
      const power = spectrum.frame(waveform, t * this.hopLength);
      const features = new Float64Array(this.nMels);
      for (let m = 0; m < this.nMels; m++) {
        const row = filterbank[m];
        let energy = 0;
        for (let k = 0; k < row.length; k++) energy += row[k] * power[k];
        features[m] = Math.log(energy + LOG_FLOOR);
      }
      frames.push(features);
    }
    return frames;
  }

  private ensureTables(): { spectrum: PowerSpectrum; filterbank: Float64Array[] } {
    if (!this.spectrum || !this.filterbank) {
      this.spectrum = new PowerSpectrum(this.frameLength);
      this.filterbank = melFilterbank(this.sampleRate, this.spectrum.fftSize, this.nMels, this.fMin, this.fMax);
    }
    return { spectrum: this.spectrum, filterbank: this.filterbank };
  }
}
