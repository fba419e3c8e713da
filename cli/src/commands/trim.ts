import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import {
  AudioDecoder,
  encodeWav,
  normalize,
  resolveScoringConfig,
  summarizeWaveform,
  trim,
} from '@shadowscore/core';
import { loadCliConfig, scoringOverrides } from '../config';
import { failureMessage } from '../output';
import { referenceWindow } from './score';

interface TrimOptions {
  start?: number;
  end?: number;
  config?: string;
  output?: string;
  normalize?: boolean;
  json?: boolean;
}

export async function trimCommand(file: string, options: TrimOptions) {
  const spinner = ora('Decoding audio...').start();

  try {
    if (!await fs.pathExists(file)) {
      spinner.fail(`File not found: ${file}`);
      process.exit(1);
    }

    const cliConfig = await loadCliConfig(options.config);
    const config = resolveScoringConfig(scoringOverrides(cliConfig));
    const sr = config.sampleRate;

    const decoded = await new AudioDecoder({ ffmpeg: cliConfig.decoder }).decode(file, sr, referenceWindow(options));
    spinner.text = 'Trimming silence...';
    const trimmed = trim(decoded.samples, sr, config.trim);
    const normalized = normalize(trimmed.trimmedWaveform, config.normalize.targetRms, config.normalize.maxGain);

    if (options.output) {
      const samples = options.normalize ? normalized.waveform : trimmed.trimmedWaveform;
      await fs.outputFile(options.output, encodeWav(samples, sr));
    }

    spinner.stop();

    const report = {
      file: path.resolve(file),
      decoder: decoded.strategy,
      decoded: summarizeWaveform(decoded.samples, sr),
      trimmed: summarizeWaveform(trimmed.trimmedWaveform, sr),
      startSeconds: trimmed.startSampleIndex / sr,
      endSeconds: (trimmed.endSampleIndex + 1) / sr,
      threshold: trimmed.threshold,
      noiseFloorEnergy: trimmed.noiseFloorEnergy,
      peakEnergy: trimmed.peakEnergy,
      gain: normalized.appliedGain,
      output: options.output ? path.resolve(options.output) : undefined,
    };

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(chalk.gray('File:'), report.file, chalk.gray(`(${report.decoder})`));
    console.log(chalk.gray('Decoded:'), `${report.decoded.seconds.toFixed(3)}s, peak ${report.decoded.maxAbs.toFixed(4)}`);
    console.log(
      chalk.gray('Speech:'),
      `${report.startSeconds.toFixed(3)}s - ${report.endSeconds.toFixed(3)}s`,
      chalk.gray(`(${report.trimmed.seconds.toFixed(3)}s kept)`)
    );
    console.log(
      chalk.gray('Threshold:'),
      `${report.threshold.toFixed(4)} (noise ${report.noiseFloorEnergy.toFixed(4)}, peak ${report.peakEnergy.toFixed(4)})`
    );
    console.log(chalk.gray('Normalize gain:'), report.gain.toFixed(2));
    if (report.output) {
      console.log(chalk.green('✓'), `Wrote ${report.output}`);
    }
  } catch (error) {
    spinner.fail(`Trim failed: ${failureMessage(error).message}`);
    process.exit(1);
  }
}
