/**
 * cachematrix-cli - programmatic access to what the `cachematrix` command runs
 */

export * from './config/index.js';
export { ConfigError } from './common/errors.js';
export { allPassed, runChecks, type VariantReport } from './run.js';
export { formatDeviation, renderJson, renderTable, renderText, reportRows, summaryLine } from './report.js';
export { buildOverrides, runCli, type CliOptions, type CliOutput } from './options.js';
