import chalk from 'chalk';
import type { ResultRecord } from './results-constants.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export interface ReporterOptions {
  format: OutputFormat;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function formatValue(value: number): string {
  return Number.isInteger(value) ? value.toString() : value.toFixed(2);
}

export function printResults(
  test: string,
  record: ResultRecord,
  options: ReporterOptions = { format: 'pretty' }
): void {
  switch (options.format) {
    case 'json':
      printJson(test, record);
      break;
    case 'csv':
      printCsv(test, record);
      break;
    default:
      printPretty(test, record);
  }
}

function printPretty(test: string, record: ResultRecord): void {
  const entries = Object.entries(record);
  const width = Math.max(0, ...entries.map(([key]) => key.length)) + 2;

  console.log('');
  console.log(chalk.bold('Traffic Generator Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Test:')}  ${test}`);
  console.log('');

  for (const [key, value] of entries) {
    if (value === undefined) continue;
    console.log(`  ${`${key}:`.padEnd(width)}${chalk.bold(formatValue(value))}`);
  }

  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

function printJson(test: string, record: ResultRecord): void {
  console.log(JSON.stringify({ test, results: record }, null, 2));
}

function printCsv(test: string, record: ResultRecord): void {
  const entries = Object.entries(record);

  // Header
  console.log(['test', ...entries.map(([key]) => key)].join(','));

  // Data
  console.log([test, ...entries.map(([, value]) => String(value))].join(','));
}
