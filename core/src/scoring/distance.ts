/**
 * Distances between two lag-aligned, bias-removed embedding sequences.
 *
 * The DTW distance tolerates tempo differences; the strict (diagonal-only)
 * distance does not. Blending the two keeps unrelated speech from scoring
 * well just because DTW found a cheap warp through it.
 */
import { DistanceBreakdown, EmbeddingSequence } from '../types';
import { DEFAULT_SCORING_CONFIG, DistanceOptions } from '../config';
import { InternalInvariantError } from '../errors';
import { clamp } from '../dsp/stats';
import { dot } from './align';

/** 1 - cos for unit vectors; 0 same direction, 2 opposite. */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  return 1 - clamp(dot(a, b), -1, 1);
}

/** Mean cosine distance at matching positions, over min(T, U) frames. */
export function strictDistance(ref: EmbeddingSequence, user: EmbeddingSequence): number {
  const n = Math.min(ref.length, user.length);
  if (n === 0) return Infinity;
  let s = 0;
  for (let i = 0; i < n; i++) s += cosineDistance(ref[i], user[i]);
  return s / n;
}

/** Sakoe-Chiba half-width: max(|T - U|, max(1, round(ratio * max(T, U)))). */
export function dtwBandWidth(refFrames: number, userFrames: number, bandRatio: number): number {
  const ratioBand = Math.max(1, Math.round(bandRatio * Math.max(refFrames, userFrames)));
  return Math.max(Math.abs(refFrames - userFrames), ratioBand);
}

/**
 * Mean cost along the cheapest monotonic path from (0, 0) to (T-1, U-1)
 * inside the band: total path cost divided by path length.
 */
export function dtwDistance(ref: EmbeddingSequence, user: EmbeddingSequence, bandRatio = 0.35): number {
  const T = ref.length;
  const U = user.length;
  if (T === 0 || U === 0) return Infinity;

  const band = dtwBandWidth(T, U, bandRatio);

  // Rolling rows over j in [0, U]; column 0 is the virtual start
  let prevCost = new Float64Array(U + 1).fill(Infinity);
  let currCost = new Float64Array(U + 1);
  let prevLen = new Int32Array(U + 1);
  let currLen = new Int32Array(U + 1);
  prevCost[0] = 0;

  for (let i = 1; i <= T; i++) {
    currCost.fill(Infinity);
    currLen.fill(0);

    const jMin = Math.max(1, i - band);
    const jMax = Math.min(U, i + band);
    if (jMin > jMax) {
      throw new InternalInvariantError(`DTW band ${band} excludes row ${i} of ${T}x${U}`);
    }

    for (let j = jMin; j <= jMax; j++) {
      const d = cosineDistance(ref[i - 1], user[j - 1]);

      // insertion, deletion, match; earlier candidates win ties
      let bestCost = prevCost[j];
      let bestLen = prevLen[j];
      if (currCost[j - 1] < bestCost) {
        bestCost = currCost[j - 1];
        bestLen = currLen[j - 1];
      }
      if (prevCost[j - 1] < bestCost) {
        bestCost = prevCost[j - 1];
        bestLen = prevLen[j - 1];
      }

      currCost[j] = bestCost + d;
      currLen[j] = bestLen + 1;
    }

    [prevCost, currCost] = [currCost, prevCost];
    [prevLen, currLen] = [currLen, prevLen];
  }

  const total = prevCost[U];
  const steps = prevLen[U];
  if (!Number.isFinite(total) || steps <= 0) {
    throw new InternalInvariantError(`DTW found no path through a ${T}x${U} band of ${band}`);
  }
  return total / steps;
}

/**
 * Penalty for low aligned similarity ("said something else"). Scaled down
 * for short sequences, where the similarity estimate is noisy.
 */
export function similarityPenalty(
  similarity: number,
  minFrames: number,
  options: Pick<DistanceOptions, 'simGate' | 'simPenaltyMax' | 'penaltyFullFrames'> = DEFAULT_SCORING_CONFIG.distance
): { penalty: number; confidenceScale: number } {
  const confidenceScale = clamp(minFrames / options.penaltyFullFrames, 0, 1);
  if (!Number.isFinite(similarity)) {
    return { penalty: options.simPenaltyMax * confidenceScale, confidenceScale };
  }
  if (similarity >= options.simGate) {
    return { penalty: 0, confidenceScale };
  }
  const t = clamp((options.simGate - similarity) / options.simGate, 0, 1);
  return { penalty: t * t * options.simPenaltyMax * confidenceScale, confidenceScale };
}

export function scoreDistance(
  ref: EmbeddingSequence,
  user: EmbeddingSequence,
  similarity: number,
  options: DistanceOptions = DEFAULT_SCORING_CONFIG.distance
): DistanceBreakdown {
  const dtw = dtwDistance(ref, user, options.bandRatio);
  const strict = strictDistance(ref, user);
  const base = options.dtwWeight * dtw + (1 - options.dtwWeight) * strict;
  const { penalty, confidenceScale } = similarityPenalty(similarity, Math.min(ref.length, user.length), options);
  return {
    dtw,
    strict,
    base,
    penalty,
    confidenceScale,
    distance: base + penalty,
    refFrameCount: ref.length,
    userFrameCount: user.length,
  };
}
