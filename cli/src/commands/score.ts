import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import {
  AudioDecoder,
  ScoreResult,
  ShadowingScoringEngine,
  TimeWindow,
} from '@shadowscore/core';
import { createEmbedder, loadCliConfig, resolveEmbedderUrl, scoringOverrides } from '../config';
import { createConsoleObserver, failureMessage, renderPreview, scoreColor } from '../output';

export interface ScoreOptions {
  start?: number;
  end?: number;
  config?: string;
  embedderUrl?: string;
  json?: boolean;
  verbose?: boolean;
}

/** Window from --start/--end; none when neither is given. */
export function referenceWindow(options: Pick<ScoreOptions, 'start' | 'end'>): TimeWindow | undefined {
  if (options.start === undefined && options.end === undefined) return undefined;
  return { start: options.start ?? 0, end: options.end ?? Infinity };
}

export async function scoreCommand(reference: string, recording: string, options: ScoreOptions) {
  const spinner = ora('Preparing...').start();

  try {
    for (const file of [reference, recording]) {
      if (!await fs.pathExists(file)) {
        spinner.fail(`File not found: ${file}`);
        process.exit(1);
      }
    }

    const config = await loadCliConfig(options.config);
    const embedderUrl = resolveEmbedderUrl(options.embedderUrl, config);
    const embedder = createEmbedder(config, embedderUrl);

    const observer = options.verbose
      ? createConsoleObserver((line) => {
          spinner.clear();
          console.log(line);
          spinner.render();
        })
      : undefined;

    spinner.text = embedderUrl ? `Warming up embedding service ${embedderUrl}...` : 'Warming up embedder...';
    await embedder.warmup();

    const engine = new ShadowingScoringEngine(reference, embedder, {
      config: scoringOverrides(config),
      decoder: new AudioDecoder({ ffmpeg: config.decoder }),
      observer,
    });

    spinner.text = 'Scoring attempt...';
    const window = referenceWindow(options);
    const result = await engine.scoreWindow(window, recording);

    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      displayResult(reference, recording, window, result);
    }
  } catch (error) {
    const { message, hint } = failureMessage(error);
    spinner.fail(`Scoring failed: ${message}`);
    if (hint) {
      console.log(chalk.yellow(`  ${hint}`));
    }
    process.exit(1);
  }
}

function displayResult(reference: string, recording: string, window: TimeWindow | undefined, result: ScoreResult) {
  const { reference: refPreview, user: userPreview } = result.waveformComparison;

  console.log('\n' + chalk.bold('='.repeat(60)));
  console.log(chalk.bold('  Shadowing Score'));
  console.log(chalk.bold('='.repeat(60)) + '\n');

  const segment = window
    ? ` [${window.start}s - ${Number.isFinite(window.end) ? `${window.end}s` : 'end'}]`
    : '';
  console.log(chalk.gray('Reference:'), path.resolve(reference) + segment);
  console.log(chalk.gray('Recording:'), path.resolve(recording));
  console.log(chalk.gray('Score:'), scoreColor(result.acousticScore)(result.acousticScore.toFixed(1)));
  console.log(chalk.gray('Mean distance:'), result.meanDistance.toFixed(4));
  console.log(chalk.gray('Frames:'), `reference ${result.referenceFrameCount} / recording ${result.userFrameCount}`);

  console.log('\n' + chalk.bold('Waveforms:'));
  console.log(chalk.cyan(`  reference ${refPreview.durationSeconds.toFixed(2).padStart(6)}s `) + renderPreview(refPreview));
  console.log(chalk.magenta(`  recording ${userPreview.durationSeconds.toFixed(2).padStart(6)}s `) + renderPreview(userPreview));

  console.log('\n' + chalk.bold('='.repeat(60)) + '\n');
}
