#!/usr/bin/env -S node --import tsx
/**
 * CLI entry point: checks both caching designs and reports per-check results.
 */

import { Command } from 'commander';
import debug from 'debug';
import { runCli, type CliOptions } from '../options.js';

const program = new Command();

program
  .name('cachematrix')
  .description('Check that cached matrix inverses stay exact, consistent and computed once')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config file (JSON)')
  .option('-v, --variant <names>', 'Comma-separated variants: externally-cached, self-caching')
  .option('-t, --trials <n>', 'Number of random matrices')
  .option('-s, --size <n>', 'Dimension of the random matrices')
  .option('--seed <n>', 'Seed for the random matrices')
  .option('--tolerance <x>', 'Singularity tolerance passed to the inversion routine')
  .option('--identity-tolerance <x>', 'Largest accepted distance from identity for random matrices')
  .option('--json', 'Output the reports as JSON')
  .option('--no-color', 'Disable colored output')
  .option('--debug <namespaces>', 'Debug namespaces (e.g., "cachematrix:*")')
  .action((options: CliOptions) => {
    if (options.debug) {
      debug.enable(options.debug);
    }
    process.exitCode = runCli(options);
  });

program.parse();
