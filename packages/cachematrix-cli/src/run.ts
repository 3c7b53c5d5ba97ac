import { createVariant, runVariantChecks, type MatrixCheckReport, type VariantName } from 'cachematrix';
import type { CliConfig } from './config/index.js';
import { runLog } from './common/logger.js';

export interface VariantReport {
  variant: VariantName;
  report: MatrixCheckReport;
}

/**
 * Run the harness against every configured variant, in order.
 */
export function runChecks(config: CliConfig): VariantReport[] {
  return config.variants.map(variant => {
    runLog('Checking %s', variant);
    const report = runVariantChecks(createVariant(variant), config.harness);
    runLog('%s: %s', variant, report.passed ? 'passed' : 'failed');
    return { variant, report };
  });
}

export function allPassed(reports: VariantReport[]): boolean {
  return reports.every(({ report }) => report.passed);
}
