/**
 * Configuration types for cachematrix-cli.
 */

import { DEFAULT_HARNESS_OPTIONS, VARIANT_NAMES, type HarnessOptions, type VariantName } from 'cachematrix';

export type OutputFormat = 'table' | 'json';

/**
 * Output configuration.
 */
export interface OutputConfig {
  /** 'table' prints one table per variant, 'json' prints the raw reports */
  format: OutputFormat;
  /** Whether to color the table output */
  color: boolean;
}

/**
 * Full CLI configuration.
 */
export interface CliConfig {
  /** Caching designs to check, in order */
  variants: VariantName[];

  /** Harness settings shared by every variant */
  harness: HarnessOptions;

  output: OutputConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CliConfig = {
  variants: [...VARIANT_NAMES],
  harness: { ...DEFAULT_HARNESS_OPTIONS, scales: [...DEFAULT_HARNESS_OPTIONS.scales] },
  output: {
    format: 'table',
    color: true,
  },
};

/**
 * Partial configuration for merging.
 */
export type PartialCliConfig = {
  variants?: VariantName[];
  harness?: Partial<HarnessOptions>;
  output?: Partial<OutputConfig>;
};
