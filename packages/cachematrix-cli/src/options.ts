import chalk from 'chalk';
import type { HarnessOptions } from 'cachematrix';
import {
  loadConfig,
  parseInteger,
  parseNumber,
  parseVariantList,
  type PartialCliConfig,
} from './config/index.js';
import { allPassed, runChecks } from './run.js';
import { renderJson, renderText } from './report.js';

/**
 * Options as commander hands them over: raw strings, parsed here.
 */
export interface CliOptions {
  config?: string;
  variant?: string;
  trials?: string;
  size?: string;
  seed?: string;
  tolerance?: string;
  identityTolerance?: string;
  json?: boolean;
  color: boolean;
  debug?: string;
}

export interface CliOutput {
  log(message: string): void;
  error(...parts: unknown[]): void;
}

/**
 * Turn command line flags into the highest-priority config layer.
 */
export function buildOverrides(options: CliOptions): PartialCliConfig {
  const overrides: PartialCliConfig = {};

  if (options.variant) {
    overrides.variants = parseVariantList(options.variant, '--variant');
  }

  const harness: Partial<HarnessOptions> = {};
  if (options.trials) harness.trials = parseInteger(options.trials, '--trials');
  if (options.size) harness.randomSize = parseInteger(options.size, '--size');
  if (options.seed) harness.seed = parseInteger(options.seed, '--seed');
  if (options.tolerance) harness.tolerance = parseNumber(options.tolerance, '--tolerance');
  if (options.identityTolerance) {
    harness.identityTolerance = parseNumber(options.identityTolerance, '--identity-tolerance');
  }
  if (Object.keys(harness).length > 0) {
    overrides.harness = harness;
  }

  if (options.json) {
    overrides.output = { format: 'json' };
  }
  if (!options.color) {
    overrides.output = { ...overrides.output, color: false };
  }

  return overrides;
}

/**
 * Load config, run the checks and print the reports.
 *
 * @returns the process exit code: 0 when every check passed, 1 on a failed check or any error
 */
export function runCli(
  options: CliOptions,
  output: CliOutput = console,
  env: NodeJS.ProcessEnv = process.env
): number {
  try {
    const config = loadConfig({
      configPath: options.config,
      overrides: buildOverrides(options),
      env,
    });

    const reports = runChecks(config);
    output.log(config.output.format === 'json'
      ? renderJson(reports)
      : renderText(reports, config.output.color));

    return allPassed(reports) ? 0 : 1;
  } catch (error) {
    output.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
    return 1;
  }
}
