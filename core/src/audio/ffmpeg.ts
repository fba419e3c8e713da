/**
 * Frame-by-frame fallback decoder: asks an ffmpeg binary to demux, decode,
 * downmix and resample the source to raw little-endian float32 on stdout.
 * Handles any container ffmpeg understands (m4a, mp3, webm, ...).
 */
import { execFile } from 'child_process';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import fs from 'fs-extra';
import { AudioSource, TimeWindow, Waveform } from '../types';
import { DecodeStrategy } from './decoder';

const execFileAsync = promisify(execFile);

/** Runs ffmpeg and resolves with its stdout. */
export type FfmpegRunner = (file: string, args: string[], timeoutMs: number) => Promise<Buffer>;

export interface FfmpegDecoderOptions {
  ffmpegPath?: string;
  timeoutMs?: number;
  runner?: FfmpegRunner;
}

const DEFAULT_TIMEOUT_MS = 60_000;
// Raw float32 output for ~1 hour of 16 kHz mono audio
const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

const defaultRunner: FfmpegRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, {
    encoding: 'buffer',
    maxBuffer: MAX_OUTPUT_BYTES,
    timeout: timeoutMs,
  });
  return stdout;
};

export function buildFfmpegArgs(inputPath: string, sampleRate: number, window?: TimeWindow): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-nostdin'];
  if (window) {
    args.push('-ss', String(window.start));
    if (Number.isFinite(window.end)) {
      args.push('-t', String(window.end - window.start));
    }
  }
  args.push('-i', inputPath, '-vn', '-ac', '1', '-ar', String(sampleRate), '-f', 'f32le', 'pipe:1');
  return args;
}

export function parseFloat32Le(raw: Buffer): Float32Array {
  const count = Math.floor(raw.length / 4);
  const out = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    out[i] = raw.readFloatLE(i * 4);
  }
  return out;
}

export class FfmpegDecoder implements DecodeStrategy {
  readonly name = 'ffmpeg';
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly runner: FfmpegRunner;

  constructor(options: FfmpegDecoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.runner = options.runner ?? defaultRunner;
  }

  async decode(source: AudioSource, sampleRate: number, window?: TimeWindow): Promise<Waveform> {
    if (typeof source === 'string') {
      return this.decodeFile(source, sampleRate, window);
    }

    // ffmpeg needs a seekable input for -ss; stage in-memory sources on disk
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shadowscore-'));
    const inputPath = path.join(tmpDir, 'input');
    try {
      await fs.writeFile(inputPath, source);
      return await this.decodeFile(inputPath, sampleRate, window);
    } finally {
      await fs.remove(tmpDir);
    }
  }

  private async decodeFile(inputPath: string, sampleRate: number, window?: TimeWindow): Promise<Waveform> {
    const stdout = await this.runner(this.ffmpegPath, buildFfmpegArgs(inputPath, sampleRate, window), this.timeoutMs);
    if (stdout.length % 4 !== 0) {
      throw new Error(`ffmpeg produced ${stdout.length} bytes, not a whole number of float32 samples`);
    }
    return parseFloat32Le(stdout);
  }
}
