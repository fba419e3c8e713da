import { clamp, lowerPercentile, meanAbs, peakAbs, rms, summarizeWaveform } from '../dsp/stats';

describe('stats', () => {
  it('should clamp into range', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.25, 0, 1)).toBe(0.25);
  });

  it('should ignore non-finite samples in peak and rms', () => {
    expect(peakAbs([0.2, -0.7, NaN, Infinity])).toBe(0.7);
    expect(rms([3, -4, NaN])).toBeCloseTo(Math.sqrt(12.5), 10);
    expect(rms([NaN])).toBe(0);
  });

  it('should average |x| over a clipped range', () => {
    expect(meanAbs([1, -2, 3], 1, 10)).toBe(2.5);
    expect(meanAbs([1, -2, 3], 5, 10)).toBe(0);
  });

  describe('lowerPercentile', () => {
    it('should pick the lower-rank element without interpolation', () => {
      const values = [5, 1, 4, 2, 3];
      expect(lowerPercentile(values, 20)).toBe(1);
      expect(lowerPercentile(values, 50)).toBe(3);
      expect(lowerPercentile(values, 100)).toBe(5);
    });

    it('should return 0 for empty input', () => {
      expect(lowerPercentile([], 20)).toBe(0);
    });
  });

  it('should summarize a waveform and count non-finite samples', () => {
    const summary = summarizeWaveform(Float32Array.from([0.5, NaN, -0.5, 0]), 4);
    expect(summary.samples).toBe(4);
    expect(summary.seconds).toBe(1);
    expect(summary.maxAbs).toBe(0.5);
    expect(summary.rms).toBeCloseTo(Math.sqrt(0.5 / 3), 10);
    expect(summary.nonFiniteCount).toBe(1);
  });
});
