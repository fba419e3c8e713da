import { EmbeddingSequence } from '../types';

export const SR = 16000;

// ---------------------------------------------------------------------------
// Synthetic signals
// ---------------------------------------------------------------------------

/** A steady sine tone. */
export function tone(freq: number, seconds: number, amplitude = 0.5, sampleRate = SR): Float32Array {
  const n = Math.round(seconds * sampleRate);
  const out = new Float32Array(n);
  for (let i = 0; i < n; i++) {
    out[i] = amplitude * Math.sin((2 * Math.PI * freq * i) / sampleRate);
  }
  return out;
}

export function silence(seconds: number, sampleRate = SR): Float32Array {
  return new Float32Array(Math.round(seconds * sampleRate));
}

export function concat(...parts: Float32Array[]): Float32Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

/** Two contiguous tone bursts, 0.4 s each: a stand-in for a short utterance. */
export function utterance(lowHz = 220, highHz = 660): Float32Array {
  return concat(tone(lowHz, 0.4), tone(highHz, 0.4));
}

// ---------------------------------------------------------------------------
// Embedding sequences
// ---------------------------------------------------------------------------

/** Unit basis vector e_i of the given dimension. */
export function basis(i: number, dim: number): Float32Array {
  const v = new Float32Array(dim);
  v[i] = 1;
  return v;
}

export function sequence(...frames: number[][]): EmbeddingSequence {
  return frames.map((f) => Float32Array.from(f));
}
