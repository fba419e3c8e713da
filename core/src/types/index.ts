/**
 * Mono PCM samples. Every scoring path runs at a single sample rate
 * (16 kHz by default) which travels alongside the array, not inside it.
 */
export type Waveform = Float32Array;

/** An audio file path, or its bytes already in memory. */
export type AudioSource = string | Buffer;

export type SourceRole = 'reference' | 'user';

/** Seconds; `end` may be Infinity to run to the end of the source. */
export interface TimeWindow {
  start: number;
  end: number;
}

export interface TrimResult {
  trimmedWaveform: Waveform;
  startSampleIndex: number;
  /** Inclusive. -1 for an empty input. */
  endSampleIndex: number;
  threshold: number;
  noiseFloorEnergy: number;
  peakEnergy: number;
}

export interface NormalizedAudio {
  waveform: Waveform;
  measuredRMS: number;
  measuredPeak: number;
  appliedGain: number;
}

/** Unit-length frame vectors with one dimensionality across the sequence. */
export type EmbeddingSequence = Float32Array[];

export interface AlignmentResult {
  lagFrames: number;
  similarity: number;
}

export interface WaveformPreview {
  perBinMinima: number[];
  perBinMaxima: number[];
  durationSeconds: number;
}

export interface WaveformComparison {
  reference: WaveformPreview;
  user: WaveformPreview;
}

export interface ScoreResult {
  acousticScore: number;
  meanDistance: number;
  referenceFrameCount: number;
  userFrameCount: number;
  waveformComparison: WaveformComparison;
}

export interface WaveformSummary {
  samples: number;
  seconds: number;
  maxAbs: number;
  rms: number;
  nonFiniteCount: number;
}

export interface DistanceBreakdown {
  dtw: number;
  strict: number;
  base: number;
  penalty: number;
  confidenceScale: number;
  distance: number;
  refFrameCount: number;
  userFrameCount: number;
}

// ---------------------------------------------------------------------------
// Pipeline diagnostics
// ---------------------------------------------------------------------------

export type ScoringEvent =
  | { stage: 'decode'; role: SourceRole; strategy: string; summary: WaveformSummary }
  | { stage: 'decode-fallback'; strategy: string; error: string }
  | {
      stage: 'trim';
      role: SourceRole;
      headSeconds: number;
      tailSeconds: number;
      threshold: number;
      noiseFloorEnergy: number;
      peakEnergy: number;
      summary: WaveformSummary;
    }
  | { stage: 'normalize'; role: SourceRole; rms: number; peak: number; gain: number }
  | { stage: 'embed'; role: SourceRole; frames: number; dimension: number }
  | { stage: 'align'; lagFrames: number; similarity: number; maxLag: number; approxOffsetSeconds: number }
  | ({ stage: 'distance'; similarity: number } & DistanceBreakdown)
  | { stage: 'score'; baseScore: number; durationRatio: number; durationFactor: number; acousticScore: number }
  | { stage: 'preview'; bins: number; normMaxAbs: number; referenceSeconds: number; userSeconds: number };

export type ScoringObserver = (event: ScoringEvent) => void;
