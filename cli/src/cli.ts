#!/usr/bin/env node

import { InvalidArgumentError, program } from 'commander';
import chalk from 'chalk';
import { scoreCommand } from './commands/score';
import { trimCommand } from './commands/trim';
import packageJson from '../package.json';

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return seconds;
}

program
  .name('shadowscore')
  .description('Score a spoken attempt at repeating a reference audio segment')
  .version(packageJson.version);

// Score command
program
  .command('score <reference> <recording>')
  .description('Compare a recording with a reference segment and print a 0-100 score')
  .option('-s, --start <seconds>', 'Reference segment start', parseSeconds)
  .option('-e, --end <seconds>', 'Reference segment end', parseSeconds)
  .option('-c, --config <path>', 'Path to a JSON config file')
  .option('--embedder-url <url>', 'Embedding service endpoint (defaults to the built-in spectral embedder)')
  .option('-j, --json', 'Output as JSON')
  .option('-v, --verbose', 'Log every pipeline stage')
  .action(scoreCommand);

// Trim command
program
  .command('trim <file>')
  .description('Decode a file, trim leading/trailing silence and report what was kept')
  .option('-s, --start <seconds>', 'Window start', parseSeconds)
  .option('-e, --end <seconds>', 'Window end', parseSeconds)
  .option('-c, --config <path>', 'Path to a JSON config file')
  .option('-o, --output <path>', 'Write the trimmed audio as 16-bit WAV')
  .option('-n, --normalize', 'Write loudness-normalised audio instead')
  .option('-j, --json', 'Output as JSON')
  .action(trimCommand);

// Global error handler
process.on('unhandledRejection', (error) => {
  console.error(chalk.red('Error:'), error);
  process.exit(1);
});

if (require.main === module) {
  program.parse();
}
