/**
 * RIFF/WAVE reader and writer (pure JS).
 *
 * Reads 8/16/24/32-bit integer PCM, 32/64-bit IEEE float and the
 * WAVE_FORMAT_EXTENSIBLE wrapper around either. Channels stay interleaved
 * in the parsed result so callers can window before downmixing.
 */

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export interface WavInfo {
  sampleRate: number;
  numChannels: number;
  bitsPerSample: number;
  isFloat: boolean;
  /** Frames (one sample per channel) available in the data chunk. */
  frameCount: number;
  data: Buffer;
}

export function parseWav(buffer: Buffer): WavInfo {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('Not a valid WAV file (missing RIFF header)');
  }
  if (buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Not a valid WAV file (missing WAVE header)');
  }

  let offset = 12;
  let fmtFound = false;
  let formatTag = WAVE_FORMAT_PCM;
  let sampleRate = 0;
  let numChannels = 1;
  let bitsPerSample = 16;
  let data: Buffer | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || offset + 16 > buffer.length) {
        throw new Error('Invalid WAV: truncated fmt chunk');
      }
      formatTag = buffer.readUInt16LE(offset);
      numChannels = buffer.readUInt16LE(offset + 2);
      sampleRate = buffer.readUInt32LE(offset + 4);
      bitsPerSample = buffer.readUInt16LE(offset + 14);
      if (formatTag === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 26 && offset + 26 <= buffer.length) {
        // First two bytes of the SubFormat GUID carry the real format tag
        formatTag = buffer.readUInt16LE(offset + 24);
      }
      fmtFound = true;
    } else if (chunkId === 'data') {
      // Streamed writers leave the size at 0 or 0xFFFFFFFF; take what is there
      const end = chunkSize === 0 ? buffer.length : Math.min(buffer.length, offset + chunkSize);
      data = buffer.subarray(offset, end);
      break;
    }
    offset += chunkSize;
    // Align to 2-byte boundary
    if (chunkSize % 2 !== 0) offset++;
  }

  if (!fmtFound || !data) {
    throw new Error('Invalid WAV: missing fmt or data chunk');
  }
  if (sampleRate <= 0 || numChannels <= 0) {
    throw new Error(`Invalid WAV: sampleRate=${sampleRate} channels=${numChannels}`);
  }

  const isFloat = formatTag === WAVE_FORMAT_IEEE_FLOAT;
  if (isFloat) {
    if (bitsPerSample !== 32 && bitsPerSample !== 64) {
      throw new Error(`Unsupported float WAV bit depth ${bitsPerSample}`);
    }
  } else if (formatTag === WAVE_FORMAT_PCM) {
    if (![8, 16, 24, 32].includes(bitsPerSample)) {
      throw new Error(`Unsupported PCM WAV bit depth ${bitsPerSample}`);
    }
  } else {
    throw new Error(`Unsupported WAV format tag 0x${formatTag.toString(16)}`);
  }

  const bytesPerFrame = (bitsPerSample / 8) * numChannels;
  return {
    sampleRate,
    numChannels,
    bitsPerSample,
    isFloat,
    frameCount: Math.floor(data.length / bytesPerFrame),
    data,
  };
}

function readSample(info: WavInfo, index: number): number {
  const { data, bitsPerSample, isFloat } = info;
  const pos = index * (bitsPerSample / 8);
  if (isFloat) {
    return bitsPerSample === 32 ? data.readFloatLE(pos) : data.readDoubleLE(pos);
  }
  switch (bitsPerSample) {
    case 8:
      return data[pos] / 128.0 - 1.0;
    case 16:
      return data.readInt16LE(pos) / 32768.0;
    case 24:
      return data.readIntLE(pos, 3) / 8388608.0;
    default:
      return data.readInt32LE(pos) / 2147483648.0;
  }
}

/**
 * Mono samples for frames [startFrame, endFrame), averaging channels.
 */
export function readMonoFrames(info: WavInfo, startFrame = 0, endFrame = info.frameCount): Float32Array {
  const start = Math.max(0, Math.min(startFrame, info.frameCount));
  const end = Math.max(start, Math.min(endFrame, info.frameCount));
  const ch = info.numChannels;
  const out = new Float32Array(end - start);
  for (let f = start; f < end; f++) {
    let sum = 0;
    for (let c = 0; c < ch; c++) {
      sum += readSample(info, f * ch + c);
    }
    out[f - start] = sum / ch;
  }
  return out;
}

/** Encode mono samples as a 16-bit PCM WAV file. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buffer = Buffer.alloc(44 + dataBytes);
  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  buffer.writeUInt16LE(1, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * 2, 28);
  buffer.writeUInt16LE(2, 32);
  buffer.writeUInt16LE(16, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);
  for (let i = 0; i < samples.length; i++) {
    const x = samples[i];
    const v = Number.isFinite(x) ? Math.max(-1, Math.min(1, x)) : 0;
    buffer.writeInt16LE(Math.round(v < 0 ? v * 32768 : v * 32767), 44 + i * 2);
  }
  return buffer;
}
