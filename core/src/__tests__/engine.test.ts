import { ShadowingScoringEngine } from '../engine/engine';
import { ShadowingSession } from '../engine/session';
import { AudioDecoder } from '../audio/decoder';
import { encodeWav } from '../audio/wav';
import { EmbeddingModel } from '../embedding/model';
import { SpectralEmbedder } from '../embedding/spectral';
import {
  ModelInferenceError,
  NoVoiceDetectedError,
  ScoringCancelledError,
  SegmentTooShortError,
} from '../errors';
import { ScoringEvent } from '../types';
import { SR, concat, silence, tone, utterance } from './helpers';

function embedder() {
  return new SpectralEmbedder({ minSamples: 4000 });
}

/** Engine over in-memory waveforms; the reference source is never decoded. */
function engineFor(model: EmbeddingModel = embedder(), events?: ScoringEvent[]) {
  return new ShadowingScoringEngine(Buffer.alloc(0), model, {
    observer: events ? (e) => events.push(e) : undefined,
  });
}

function stubModel(): EmbeddingModel {
  return {
    sampleRate: SR,
    embedWindow: jest.fn(),
    embedSequence: jest.fn(),
  };
}

describe('ShadowingScoringEngine', () => {
  describe('scoreWaveforms', () => {
    it('should give an identical attempt full marks', async () => {
      const ref = utterance();

      const result = await engineFor().scoreWaveforms(ref, utterance());

      expect(result.acousticScore).toBe(100);
      expect(result.meanDistance).toBeLessThan(0.1);
      expect(result.referenceFrameCount).toBe(39);
      expect(result.userFrameCount).toBe(39);
      expect(result.waveformComparison.reference.perBinMaxima).toHaveLength(240);
      expect(result.waveformComparison.user.perBinMinima).toHaveLength(240);
      expect(result.waveformComparison.reference.durationSeconds).toBeCloseTo(0.8, 10);
    });

    it.each([500, 1000])('should give an identical steady %d Hz tone full marks', async (hz) => {
      const events: ScoringEvent[] = [];

      const result = await engineFor(embedder(), events).scoreWaveforms(tone(hz, 1), tone(hz, 1));

      const aligned = events.find((e) => e.stage === 'align');
      if (!aligned || aligned.stage !== 'align') throw new Error('no align event');
      expect(aligned.lagFrames).toBe(0);
      expect(aligned.similarity).toBeCloseTo(1, 4);
      expect(result.meanDistance).toBeLessThan(0.01);
      expect(result.acousticScore).toBeCloseTo(100, 6);
    });

    it('should score a different utterance well below an identical one', async () => {
      const result = await engineFor().scoreWaveforms(utterance(220, 660), utterance(660, 220));
      expect(result.acousticScore).toBeLessThan(50);
    });

    it('should be deterministic', async () => {
      const engine = engineFor();
      const ref = utterance();
      const user = concat(silence(0.1), utterance(), silence(0.2));

      const first = await engine.scoreWaveforms(ref, user);
      const second = await engine.scoreWaveforms(ref, user);

      expect(second).toEqual(first);
    });

    it('should reject a silent recording without running the model', async () => {
      const model = stubModel();

      const attempt = engineFor(model).scoreWaveforms(utterance(), silence(1));
      await expect(attempt).rejects.toBeInstanceOf(NoVoiceDetectedError);
      await expect(attempt).rejects.toMatchObject({ role: 'user', peak: 0 });
      expect(model.embedSequence).not.toHaveBeenCalled();
    });

    it('should reject a recording that is too short', async () => {
      const attempt = engineFor(stubModel()).scoreWaveforms(utterance(), tone(440, 0.1));
      await expect(attempt).rejects.toBeInstanceOf(SegmentTooShortError);
      await expect(attempt).rejects.toMatchObject({ role: 'user', minSamples: 4000 });
    });

    it('should reject a reference that is too short', async () => {
      const attempt = engineFor(stubModel()).scoreWaveforms(tone(440, 0.1), utterance());
      await expect(attempt).rejects.toMatchObject({ code: 'SEGMENT_TOO_SHORT', role: 'reference' });
    });

    it('should scale the score down when the attempt runs three times as long', async () => {
      const events: ScoringEvent[] = [];
      const ref = utterance();

      const result = await engineFor(embedder(), events).scoreWaveforms(ref, concat(ref, ref, ref));

      const scored = events.find((e) => e.stage === 'score');
      if (!scored || scored.stage !== 'score') throw new Error('no score event');
      expect(scored.durationRatio).toBe(3);
      expect(scored.durationFactor).toBeCloseTo(1.6 / 3, 12);
      expect(result.acousticScore).toBeCloseTo(scored.baseScore * scored.durationFactor, 10);
      expect(result.acousticScore).toBeLessThanOrEqual(100 * (1.6 / 3) + 1e-9);
    });

    it('should measure duration in frames when configured', async () => {
      const events: ScoringEvent[] = [];
      const ref = utterance();
      const engine = new ShadowingScoringEngine(Buffer.alloc(0), embedder(), {
        config: { calibration: { durationBasis: 'frames' } },
        observer: (e) => events.push(e),
      });

      await engine.scoreWaveforms(ref, concat(ref, ref));

      const distance = events.find((e) => e.stage === 'distance');
      const scored = events.find((e) => e.stage === 'score');
      if (!distance || distance.stage !== 'distance' || !scored || scored.stage !== 'score') {
        throw new Error('missing events');
      }
      expect(scored.durationRatio).toBe(distance.userFrameCount / distance.refFrameCount);
    });

    it('should report every stage in order', async () => {
      const events: ScoringEvent[] = [];

      await engineFor(embedder(), events).scoreWaveforms(utterance(), utterance());

      expect(events.map((e) => ('role' in e ? `${e.stage}:${e.role}` : e.stage))).toEqual([
        'trim:reference',
        'normalize:reference',
        'trim:user',
        'normalize:user',
        'embed:reference',
        'embed:user',
        'align',
        'distance',
        'score',
        'preview',
      ]);
      expect(events[4]).toEqual({ stage: 'embed', role: 'reference', frames: 39, dimension: 40 });
      expect(events[6]).toMatchObject({ stage: 'align', lagFrames: 0, maxLag: 12 });
    });

    it('should fail when a model returns no frames', async () => {
      const model: EmbeddingModel = { sampleRate: SR, embedWindow: jest.fn(), embedSequence: jest.fn(async () => []) };
      await expect(engineFor(model).scoreWaveforms(utterance(), utterance())).rejects.toThrow(
        new ModelInferenceError('Embedding model returned no frames for the reference audio')
      );
    });

    it('should stop at the first stage boundary after cancellation', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(engineFor().scoreWaveforms(utterance(), utterance(), controller.signal)).rejects.toThrow(
        'Scoring cancelled before reference preparation'
      );
    });
  });

  describe('score', () => {
    const referenceWav = encodeWav(concat(silence(0.2), utterance(), silence(0.2)), SR);
    const attemptWav = encodeWav(utterance(), SR);

    it('should cut the reference segment out of a longer recording', async () => {
      const events: ScoringEvent[] = [];
      const engine = new ShadowingScoringEngine(referenceWav, embedder(), { observer: (e) => events.push(e) });

      const result = await engine.score(0.2, 1.0, attemptWav);

      expect(result.acousticScore).toBe(100);
      expect(events[0]).toMatchObject({ stage: 'decode', role: 'reference', strategy: 'wav' });
      expect(events[0]).toMatchObject({ summary: { samples: 12800 } });
    });

    it('should reject a reference window shorter than the minimum', async () => {
      const engine = new ShadowingScoringEngine(referenceWav, stubModel());
      const attempt = engine.score(0.2, 0.25, attemptWav);
      await expect(attempt).rejects.toBeInstanceOf(SegmentTooShortError);
      await expect(attempt).rejects.toThrow('Reference segment too short to score');
    });

    it('should treat an inverted window as an empty reference', async () => {
      const engine = new ShadowingScoringEngine(referenceWav, stubModel());
      await expect(engine.score(1, 0.5, attemptWav)).rejects.toMatchObject({ role: 'reference', samples: 0 });
    });

    it('should score the whole reference without a window', async () => {
      const engine = new ShadowingScoringEngine(attemptWav, embedder());
      const result = await engine.scoreWindow(undefined, attemptWav);
      expect(result.acousticScore).toBe(100);
    });

    it('should fail fast when the model and config disagree on sample rate', () => {
      expect(() => new ShadowingScoringEngine(referenceWav, new SpectralEmbedder({ sampleRate: 8000 }))).toThrow(
        RangeError
      );
    });

    it('should use an injected decoder', async () => {
      const decode = jest.fn(async () => utterance());
      const decoder = new AudioDecoder({ fast: { name: 'memory', decode } });
      const engine = new ShadowingScoringEngine('reference.m4a', embedder(), { decoder });

      const result = await engine.score(3, 4, 'attempt.m4a');

      expect(result.acousticScore).toBe(100);
      expect(decode).toHaveBeenNthCalledWith(1, 'reference.m4a', SR, { start: 3, end: 4 });
      expect(decode).toHaveBeenNthCalledWith(2, 'attempt.m4a', SR, undefined);
    });
  });
});

describe('ShadowingSession', () => {
  const referenceWav = encodeWav(utterance(), SR);

  it('should cancel the attempt in flight when a new one is submitted', async () => {
    const session = new ShadowingSession(new ShadowingScoringEngine(referenceWav, embedder()));

    const first = session.submit(0, 0.8, referenceWav);
    expect(session.busy).toBe(true);
    const second = session.submit(0, 0.8, referenceWav);

    await expect(first).rejects.toBeInstanceOf(ScoringCancelledError);
    await expect(second).resolves.toMatchObject({ acousticScore: 100 });
    expect(session.busy).toBe(false);
  });

  it('should cancel on request', async () => {
    const session = new ShadowingSession(new ShadowingScoringEngine(referenceWav, embedder()));

    const attempt = session.submit(0, 0.8, referenceWav);
    session.cancel();

    await expect(attempt).rejects.toThrow(ScoringCancelledError);
    expect(session.busy).toBe(false);
  });
});
