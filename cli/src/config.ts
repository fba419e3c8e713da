import fs from 'fs-extra';
import { z } from 'zod';
import {
  BaseEmbeddingModel,
  RemoteEmbeddingModel,
  ScoringConfigOverrides,
  SpectralEmbedder,
} from '@shadowscore/core';

export const EMBEDDER_URL_ENV = 'SHADOWSCORE_EMBEDDER_URL';

const positive = z.number().positive();

const ScoringSchema = z
  .object({
    sampleRate: z.number().int().positive(),
    minSegmentSeconds: positive,
    minVoicePeak: z.number().min(0).max(1),
    trim: z
      .object({
        frameMs: positive,
        hopMs: positive,
        thresholdRatio: z.number().min(0).max(1),
        minActiveFrames: z.number().int().positive(),
        paddingMs: z.number().min(0),
        baseThreshold: z.number().min(0),
      })
      .partial(),
    normalize: z.object({ targetRms: positive, maxGain: z.number().min(1) }).partial(),
    alignment: z.object({ maxLagFrames: z.number().int().min(0) }).partial(),
    distance: z
      .object({
        bandRatio: positive,
        dtwWeight: z.number().min(0).max(1),
        simGate: positive,
        simPenaltyMax: z.number().min(0),
        penaltyFullFrames: positive,
      })
      .partial(),
    calibration: z
      .object({
        dGood: z.number(),
        dBad: z.number(),
        durationLow: positive,
        durationHigh: positive,
        durationBasis: z.enum(['samples', 'frames']),
      })
      .partial(),
    preview: z.object({ bins: z.number().int().positive() }).partial(),
  })
  .partial()
  .strict();

export const CliConfigSchema = z
  .object({
    scoring: ScoringSchema.optional(),
    decoder: z
      .object({
        ffmpegPath: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    embedder: z
      .object({
        url: z.string().url().optional(),
        timeoutMs: z.number().int().positive().optional(),
        minSamples: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseCliConfig(raw: unknown, origin = 'config'): CliConfig {
  const result = CliConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid ${origin}:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

export async function loadCliConfig(configPath?: string): Promise<CliConfig> {
  if (!configPath) return {};
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCliConfig(raw, configPath);
}

export function scoringOverrides(config: CliConfig): ScoringConfigOverrides {
  return config.scoring ?? {};
}

/** --embedder-url, then the config file, then the environment. */
export function resolveEmbedderUrl(
  optionUrl: string | undefined,
  config: CliConfig,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return optionUrl ?? config.embedder?.url ?? (env[EMBEDDER_URL_ENV] || undefined);
}

export function createEmbedder(
  config: CliConfig,
  url: string | undefined
): BaseEmbeddingModel {
  const sampleRate = config.scoring?.sampleRate;
  const minSamples = config.embedder?.minSamples;
  if (url) {
    return new RemoteEmbeddingModel({ url, sampleRate, minSamples, timeoutMs: config.embedder?.timeoutMs });
  }
  return new SpectralEmbedder({ sampleRate, minSamples });
}
