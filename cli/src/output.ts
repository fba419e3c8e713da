import chalk from 'chalk';
import {
  ScoringEvent,
  ScoringObserver,
  ShadowingError,
  WaveformPreview,
  WaveformSummary,
  describeError,
} from '@shadowscore/core';

const LEVELS = ' ▁▂▃▄▅▆▇█';

const f = (value: number, digits = 4) => value.toFixed(digits);

function summary(s: WaveformSummary): string {
  const base = `samples=${s.samples} sec=${f(s.seconds, 3)} maxAbs=${f(s.maxAbs)} rms=${f(s.rms)}`;
  return s.nonFiniteCount > 0 ? `${base} nanOrInf=${s.nonFiniteCount}` : base;
}

/** One diagnostic line per pipeline checkpoint. */
export function formatEvent(event: ScoringEvent): string {
  switch (event.stage) {
    case 'decode':
      return `[decode] ${event.role} via ${event.strategy}: ${summary(event.summary)}`;
    case 'decode-fallback':
      return `[decode] fast path failed, falling back to ${event.strategy}: ${event.error}`;
    case 'trim':
      return (
        `[trim] ${event.role}: head=${f(event.headSeconds, 3)}s tail=${f(event.tailSeconds, 3)}s ` +
        `thr=${f(event.threshold)} noiseE=${f(event.noiseFloorEnergy)} maxE=${f(event.peakEnergy)} -> ${summary(event.summary)}`
      );
    case 'normalize':
      return `[normalize] ${event.role}: rms=${f(event.rms)} peak=${f(event.peak)} gain=${f(event.gain, 2)}`;
    case 'embed':
      return `[embed] ${event.role}: frames=${event.frames} dim=${event.dimension}`;
    case 'align':
      return (
        `[align] lagFrames=${event.lagFrames} approxOffset=${f(event.approxOffsetSeconds, 3)}s ` +
        `sim=${f(event.similarity, 3)} maxLag=${event.maxLag}`
      );
    case 'distance':
      return (
        `[distance] dtw=${f(event.dtw)} strict=${f(event.strict)} base=${f(event.base)} ` +
        `sim=${f(event.similarity, 3)} scale=${f(event.confidenceScale, 2)} penalty=${f(event.penalty, 3)} final=${f(event.distance)}`
      );
    case 'score':
      return (
        `[score] base=${f(event.baseScore, 2)} ratio=${f(event.durationRatio, 2)} ` +
        `durationFactor=${f(event.durationFactor, 2)} -> ${f(event.acousticScore, 2)}`
      );
    case 'preview':
      return (
        `[preview] bins=${event.bins} normMaxAbs=${f(event.normMaxAbs)} ` +
        `ref=${f(event.referenceSeconds, 2)}s user=${f(event.userSeconds, 2)}s`
      );
  }
}

export function createConsoleObserver(log: (line: string) => void = console.log): ScoringObserver {
  return (event) => log(chalk.gray(formatEvent(event)));
}

/**
 * Collapse a preview to `width` columns of block characters by peak
 * amplitude. Values are already on the comparison's shared scale.
 */
export function renderPreview(preview: WaveformPreview, width = 60): string {
  const bins = preview.perBinMaxima.length;
  if (bins === 0 || width <= 0) return '';
  const cols = Math.min(width, bins);
  let out = '';
  for (let c = 0; c < cols; c++) {
    const start = Math.floor((c * bins) / cols);
    const end = Math.max(start + 1, Math.floor(((c + 1) * bins) / cols));
    let peak = 0;
    for (let b = start; b < end; b++) {
      peak = Math.max(peak, Math.abs(preview.perBinMaxima[b]), Math.abs(preview.perBinMinima[b]));
    }
    const level = Math.min(LEVELS.length - 1, Math.round(peak * (LEVELS.length - 1)));
    out += LEVELS[level];
  }
  return out;
}

export function scoreColor(score: number): (text: string) => string {
  if (score >= 80) return chalk.green.bold;
  if (score >= 50) return chalk.yellow.bold;
  return chalk.red.bold;
}

/** Message for a failed command, with a retry hint for fixable failures. */
export function failureMessage(error: unknown): { message: string; hint?: string } {
  if (error instanceof ShadowingError) {
    return {
      message: error.code === 'DECODE_FAILURE' || error.code === 'INTERNAL_INVARIANT'
        ? describeError(error)
        : error.message,
      hint: error.userActionable ? 'Record the attempt again, speaking clearly and close to the microphone.' : undefined,
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}
