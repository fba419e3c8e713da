import { encodeWav, parseWav, readMonoFrames } from '../audio/wav';
import { resample } from '../audio/resample';
import { rms } from '../dsp/stats';
import { tone } from './helpers';

/** Minimal RIFF/WAVE container around raw sample bytes. */
function wavBuffer(formatTag: number, channels: number, sampleRate: number, bits: number, data: Buffer): Buffer {
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + data.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(formatTag, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE((sampleRate * channels * bits) / 8, 28);
  header.writeUInt16LE((channels * bits) / 8, 32);
  header.writeUInt16LE(bits, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(data.length, 40);
  return Buffer.concat([header, data]);
}

describe('WAV codec', () => {
  it('should encode 16-bit mono and read it back', () => {
    const buf = encodeWav(Float32Array.from([0, 0.5, -0.5, 1, -1]), 16000);
    expect(buf.length).toBe(44 + 10);

    const info = parseWav(buf);
    expect(info.sampleRate).toBe(16000);
    expect(info.numChannels).toBe(1);
    expect(info.bitsPerSample).toBe(16);
    expect(info.isFloat).toBe(false);
    expect(info.frameCount).toBe(5);

    const samples = readMonoFrames(info);
    expect(samples[0]).toBe(0);
    expect(samples[1]).toBe(0.5);
    expect(samples[2]).toBe(-0.5);
    expect(samples[3]).toBeCloseTo(32767 / 32768, 6);
    expect(samples[4]).toBe(-1);
  });

  it('should write non-finite samples as silence', () => {
    const info = parseWav(encodeWav(Float32Array.from([NaN, Infinity]), 8000));
    expect(Array.from(readMonoFrames(info))).toEqual([0, 0]);
  });

  it('should average stereo channels', () => {
    const data = Buffer.alloc(8);
    data.writeInt16LE(16384, 0);
    data.writeInt16LE(0, 2);
    data.writeInt16LE(-16384, 4);
    data.writeInt16LE(-16384, 6);
    const info = parseWav(wavBuffer(1, 2, 8000, 16, data));
    expect(info.frameCount).toBe(2);
    expect(Array.from(readMonoFrames(info))).toEqual([0.25, -0.5]);
  });

  it('should read 8-bit unsigned PCM', () => {
    const info = parseWav(wavBuffer(1, 1, 8000, 8, Buffer.from([128, 0, 192])));
    expect(Array.from(readMonoFrames(info))).toEqual([0, -1, 0.5]);
  });

  it('should read 32-bit float samples', () => {
    const data = Buffer.alloc(8);
    data.writeFloatLE(0.25, 0);
    data.writeFloatLE(-0.75, 4);
    const info = parseWav(wavBuffer(3, 1, 22050, 32, data));
    expect(info.isFloat).toBe(true);
    expect(Array.from(readMonoFrames(info))).toEqual([0.25, -0.75]);
  });

  it('should read a frame range', () => {
    const info = parseWav(encodeWav(Float32Array.from([0, 0.25, 0.5, 0.75]), 8000));
    expect(Array.from(readMonoFrames(info, 1, 3))).toEqual([0.25, 0.5]);
    expect(readMonoFrames(info, 3, 100).length).toBe(1);
  });

  it('should reject non-RIFF data', () => {
    expect(() => parseWav(Buffer.from('not audio at all'))).toThrow('missing RIFF header');
    expect(() => parseWav(Buffer.from('RIFF'))).toThrow('missing RIFF header');
  });

  it('should reject unsupported formats', () => {
    expect(() => parseWav(wavBuffer(2, 1, 8000, 16, Buffer.alloc(4)))).toThrow('Unsupported WAV format tag 0x2');
    expect(() => parseWav(wavBuffer(1, 1, 8000, 40, Buffer.alloc(10)))).toThrow('Unsupported PCM WAV bit depth 40');
  });
});

describe('resample', () => {
  it('should return the input when rates match', () => {
    const x = Float32Array.from([1, 2, 3]);
    expect(resample(x, 16000, 16000)).toBe(x);
  });

  it('should upsample by interpolating between neighbours', () => {
    const out = resample(Float32Array.from([0, 1, 0, -1]), 8000, 16000);
    expect(Array.from(out)).toEqual([0, 0.5, 1, 0.5, 0, -0.5, -1, -1]);
  });

  it('should downsample to round(n * to / from) samples', () => {
    const out = resample(new Float32Array(441), 44100, 16000);
    expect(out.length).toBe(160);
  });

  it('should remove content above the new Nyquist rate when downsampling', () => {
    const input = tone(12000, 1, 0.5, 48000);
    const out = resample(input, 48000, 16000);

    expect(out.length).toBe(16000);
    expect(rms(input)).toBeCloseTo(0.3536, 3);
    expect(rms(out.subarray(100, out.length - 100))).toBeLessThan(0.01);
  });

  it('should pass content well below the new Nyquist rate', () => {
    const out = resample(tone(1000, 1, 0.5, 48000), 48000, 16000);
    expect(rms(out.subarray(100, out.length - 100))).toBeCloseTo(0.3536, 2);
  });

  it('should keep a constant signal at unit gain up to the edges', () => {
    const out = resample(new Float32Array(441).fill(0.25), 44100, 16000);
    expect(out.length).toBe(160);
    for (const v of out) expect(v).toBeCloseTo(0.25, 5);
  });

  it('should reject non-positive rates', () => {
    expect(() => resample(new Float32Array(4), 0, 16000)).toThrow('Invalid resample rates');
  });
});
