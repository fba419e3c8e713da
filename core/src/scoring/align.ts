/**
 * Per-utterance bias removal and coarse lag estimation between two
 * embedding sequences.
 */
import { AlignmentResult, EmbeddingSequence } from '../types';

const EPS = 1e-8;

/** Residual-to-total energy ratio below which a sequence counts as steady. */
const STEADY_RESIDUAL = 1e-6;

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const n = Math.min(a.length, b.length);
  let s = 0;
  for (let i = 0; i < n; i++) s += a[i] * b[i];
  return s;
}

/**
 * Subtract the sequence's mean frame from every frame, then renormalise.
 * Removes speaker and channel offsets shared by the whole utterance.
 * Sequences shorter than two frames, or with ragged frames, pass through,
 * and so does a steady sequence whose frames the mean would cancel
 * (a held tone), since centring would leave nothing to compare.
 */
export function removeBias(seq: EmbeddingSequence): EmbeddingSequence {
  if (seq.length < 2) return seq;
  const dim = seq[0].length;
  if (dim === 0) return seq;

  const meanVec = new Float64Array(dim);
  for (const frame of seq) {
    if (frame.length !== dim) return seq;
    for (let i = 0; i < dim; i++) meanVec[i] += frame[i];
  }
  for (let i = 0; i < dim; i++) meanVec[i] /= seq.length;

  let totalEnergy = 0;
  let residualEnergy = 0;
  const centered = seq.map((frame) => {
    const out = new Float32Array(dim);
    for (let i = 0; i < dim; i++) {
      const v = frame[i] - meanVec[i];
      out[i] = v;
      residualEnergy += v * v;
      totalEnergy += frame[i] * frame[i];
    }
    return out;
  });
  if (residualEnergy <= STEADY_RESIDUAL * totalEnergy) return seq;

  for (const frame of centered) {
    let sum = 0;
    for (let i = 0; i < dim; i++) sum += frame[i] * frame[i];
    const norm = Math.sqrt(sum) + EPS;
    for (let i = 0; i < dim; i++) frame[i] /= norm;
  }
  return centered;
}

/** Lag search bound: min(cap, floor(min(T, U) / 2)). */
export function maxLagFor(refFrames: number, userFrames: number, cap = 12): number {
  return Math.max(0, Math.min(cap, Math.floor(Math.min(refFrames, userFrames) / 2)));
}

/**
 * Mean dot product over the overlap when `user` is shifted by `lag`
 * frames (positive lag: user frame i + lag pairs with ref frame i).
 * -1 when nothing overlaps.
 */
export function averageCosineSimilarity(ref: EmbeddingSequence, user: EmbeddingSequence, lag: number): number {
  if (ref.length === 0 || user.length === 0) return 0;
  const refStart = lag < 0 ? -lag : 0;
  const userStart = lag > 0 ? lag : 0;
  const n = Math.min(ref.length - refStart, user.length - userStart);
  if (n <= 0) return -1;

  let sum = 0;
  for (let i = 0; i < n; i++) {
    sum += dot(ref[refStart + i], user[userStart + i]);
  }
  return sum / n;
}

/**
 * Best lag in [-maxLag, maxLag] by average cosine similarity. Lag 0 is
 * scored first and a later lag must beat it strictly.
 */
export function align(ref: EmbeddingSequence, user: EmbeddingSequence, maxLag: number): AlignmentResult {
  if (ref.length === 0 || user.length === 0) {
    return { lagFrames: 0, similarity: 0 };
  }
  const bound = Math.max(0, Math.min(Math.floor(maxLag), Math.min(ref.length, user.length) - 1));

  let bestLag = 0;
  let bestSim = averageCosineSimilarity(ref, user, 0);
  for (let lag = -bound; lag <= bound; lag++) {
    if (lag === 0) continue;
    const s = averageCosineSimilarity(ref, user, lag);
    if (s > bestSim) {
      bestSim = s;
      bestLag = lag;
    }
  }
  return { lagFrames: bestLag, similarity: bestSim };
}

/**
 * Drop leading frames so the sequences start together. No-op when the
 * lag is not smaller than the sequence it would shorten.
 */
export function applyLag(
  lag: number,
  ref: EmbeddingSequence,
  user: EmbeddingSequence
): { ref: EmbeddingSequence; user: EmbeddingSequence } {
  if (lag > 0) {
    if (lag >= user.length) return { ref, user };
    return { ref, user: user.slice(lag) };
  }
  if (lag < 0) {
    const k = -lag;
    if (k >= ref.length) return { ref, user };
    return { ref: ref.slice(k), user };
  }
  return { ref, user };
}
