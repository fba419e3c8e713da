/**
 * Embedding model served over HTTP.
 *
 * POSTs the waveform as raw little-endian float32 (mono, `X-Sample-Rate`
 * header) and expects JSON back: `{ "frames": number[][] }` for a frame
 * sequence, or `{ "embedding": number[] }` for a single vector.
 */
import { z } from 'zod';
import { Waveform } from '../types';
import { ModelInferenceError } from '../errors';
import { BaseEmbeddingModel, BaseEmbeddingModelOptions } from './model';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: ArrayBuffer;
    signal: AbortSignal;
  }
) => Promise<FetchResponseLike>;

export interface RemoteEmbeddingModelOptions extends BaseEmbeddingModelOptions {
  url: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

const EmbeddingResponseSchema = z.union([
  z.object({ frames: z.array(z.array(z.number())) }),
  z.object({ embedding: z.array(z.number()) }),
]);

const DEFAULT_TIMEOUT_MS = 30_000;

export function encodeFloat32Le(waveform: Waveform): ArrayBuffer {
  const out = new ArrayBuffer(waveform.length * 4);
  const view = new DataView(out);
  for (let i = 0; i < waveform.length; i++) {
    const x = waveform[i];
    view.setFloat32(i * 4, Number.isFinite(x) ? x : 0, true);
  }
  return out;
}

export class RemoteEmbeddingModel extends BaseEmbeddingModel {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: RemoteEmbeddingModelOptions) {
    super(options);
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  protected async infer(waveform: Waveform): Promise<number[][]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let body: unknown;
    try {
      const res = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          ...this.headers,
          'Content-Type': 'application/octet-stream',
          'X-Sample-Rate': String(this.sampleRate),
        },
        body: encodeFloat32Le(waveform),
        signal: controller.signal,
      });
      if (!res.ok) {
        throw new ModelInferenceError(`Embedding service responded ${res.status}`);
      }
      body = await res.json();
    } finally {
      clearTimeout(timeout);
    }

    const parsed = EmbeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ModelInferenceError(
        `Invalid embedding service response: ${parsed.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    return 'frames' in parsed.data ? parsed.data.frames : [parsed.data.embedding];
  }
}
