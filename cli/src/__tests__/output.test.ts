import {
  DecodeFailureError,
  ModelInferenceError,
  NoVoiceDetectedError,
  ScoringEvent,
} from '@shadowscore/core';
import { createConsoleObserver, failureMessage, formatEvent, renderPreview } from '../output';
import { referenceWindow } from '../commands/score';

describe('formatEvent', () => {
  it('should format an embedding checkpoint', () => {
    expect(formatEvent({ stage: 'embed', role: 'reference', frames: 49, dimension: 40 })).toBe(
      '[embed] reference: frames=49 dim=40'
    );
  });

  it('should format a decode summary', () => {
    const event: ScoringEvent = {
      stage: 'decode',
      role: 'user',
      strategy: 'wav',
      summary: { samples: 16000, seconds: 1, maxAbs: 0.5, rms: 0.25, nonFiniteCount: 0 },
    };
    expect(formatEvent(event)).toBe('[decode] user via wav: samples=16000 sec=1.000 maxAbs=0.5000 rms=0.2500');
  });

  it('should flag non-finite samples', () => {
    const event: ScoringEvent = {
      stage: 'decode',
      role: 'user',
      strategy: 'ffmpeg',
      summary: { samples: 4, seconds: 0.25, maxAbs: 0, rms: 0, nonFiniteCount: 2 },
    };
    expect(formatEvent(event)).toBe(
      '[decode] user via ffmpeg: samples=4 sec=0.250 maxAbs=0.0000 rms=0.0000 nanOrInf=2'
    );
  });

  it('should format the score calibration', () => {
    const event: ScoringEvent = {
      stage: 'score',
      baseScore: 50,
      durationRatio: 3,
      durationFactor: 1.6 / 3,
      acousticScore: 50 * (1.6 / 3),
    };
    expect(formatEvent(event)).toBe('[score] base=50.00 ratio=3.00 durationFactor=0.53 -> 26.67');
  });

  it('should pass formatted lines to the log function', () => {
    const lines: string[] = [];
    createConsoleObserver((line) => lines.push(line))({ stage: 'embed', role: 'user', frames: 3, dimension: 2 });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[embed] user: frames=3 dim=2');
  });
});

describe('renderPreview', () => {
  it('should draw one block per column by peak amplitude', () => {
    const preview = { perBinMinima: [-1, -0.25, 0], perBinMaxima: [1, 0.5, 0], durationSeconds: 1 };
    expect(renderPreview(preview, 3)).toBe('█▄ ');
  });

  it('should merge bins into fewer columns', () => {
    const preview = { perBinMinima: [0, 0, -0.5, 0], perBinMaxima: [0.25, 0, 0, 0], durationSeconds: 1 };
    expect(renderPreview(preview, 2)).toBe('▂▄');
  });

  it('should draw nothing for an empty preview', () => {
    expect(renderPreview({ perBinMinima: [], perBinMaxima: [], durationSeconds: 0 })).toBe('');
  });
});

describe('failureMessage', () => {
  it('should add a retry hint for fixable failures', () => {
    const { message, hint } = failureMessage(new NoVoiceDetectedError('user', 0, 0.02));
    expect(message).toBe('No clear voice was recorded, try again');
    expect(hint).toBe('Record the attempt again, speaking clearly and close to the microphone.');
  });

  it('should give decode failures their full description', () => {
    const { message, hint } = failureMessage(new DecodeFailureError('a.ogg', new Error('x'), new Error('y')));
    expect(message).toBe(
      'DecodeFailureError(DECODE_FAILURE) Failed to decode a.ogg. fast path: Error: x; fallback: Error: y'
    );
    expect(hint).toBeUndefined();
  });

  it('should use the plain message otherwise', () => {
    expect(failureMessage(new ModelInferenceError('service down'))).toEqual({
      message: 'service down',
      hint: undefined,
    });
    expect(failureMessage(new Error('boom'))).toEqual({ message: 'boom' });
    expect(failureMessage('odd')).toEqual({ message: 'odd' });
  });
});

describe('referenceWindow', () => {
  it('should be absent without bounds', () => {
    expect(referenceWindow({})).toBeUndefined();
  });

  it('should default the missing bound', () => {
    expect(referenceWindow({ start: 1.5 })).toEqual({ start: 1.5, end: Infinity });
    expect(referenceWindow({ end: 2 })).toEqual({ start: 0, end: 2 });
  });
});
