import chalk from 'chalk';
import Table from 'cli-table3';
import type { CheckResult } from 'cachematrix';
import type { VariantReport } from './run.js';

const HEAD = ['suite', 'matrix', 'call', 'size', 'max deviation', 'consistent', 'result'];

export function formatDeviation(deviation: number): string {
  return deviation === 0 ? '0' : deviation.toExponential(2);
}

/**
 * One table row per check, uncolored.
 */
export function reportRows(results: CheckResult[]): string[][] {
  return results.map(result => [
    result.suite,
    result.label,
    String(result.call),
    `${result.size}x${result.size}`,
    formatDeviation(result.maxDeviation),
    result.consistent ? 'yes' : 'no',
    result.passed ? 'PASS' : 'FAIL',
  ]);
}

export function renderTable({ report }: VariantReport, color: boolean): string {
  const table = new Table({
    head: color ? HEAD.map(col => chalk.cyan(col)) : HEAD,
    style: { head: [], border: [] },
  });

  for (const row of reportRows(report.results)) {
    const result = row[row.length - 1];
    if (color) {
      row[row.length - 1] = result === 'PASS' ? chalk.green(result) : chalk.red(result);
    }
    table.push(row);
  }

  return table.toString();
}

export function summaryLine({ variant, report }: VariantReport): string {
  const passed = report.results.filter(result => result.passed).length;
  return `${variant}: ${passed}/${report.results.length} checks passed`;
}

export function renderText(reports: VariantReport[], color: boolean): string {
  const sections = reports.map(entry => {
    const heading = `**** ${entry.variant} ****`;
    return `${color ? chalk.bold(heading) : heading}\n${renderTable(entry, color)}`;
  });
  const summary = reports.map(entry => {
    const line = summaryLine(entry);
    if (!color) return line;
    return entry.report.passed ? chalk.green(line) : chalk.red(line);
  });
  return [...sections, summary.join('\n')].join('\n\n');
}

export function renderJson(reports: VariantReport[]): string {
  return JSON.stringify(reports, null, 2);
}
