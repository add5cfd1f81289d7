import chalk from 'chalk';
import { ScenarioSummary } from './types.js';

export type OutputFormat = 'line' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['line', 'json', 'csv'];

export interface ReporterOptions {
  format: OutputFormat;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

function formatLatency(ms: number | null): string {
  return ms === null ? 'n/a' : `${ms.toFixed(1)}ms`;
}

export function formatSummaryLine(s: ScenarioSummary): string {
  return [
    `[${s.label}]`,
    `ok=${s.succeeded}/${s.total}`,
    `succ=${(s.successRate * 100).toFixed(1)}%`,
    `rps=${s.throughput.toFixed(2)}`,
    `avg=${formatLatency(s.meanLatency)}`,
    `p50=${formatLatency(s.p50)}`,
    `p95=${formatLatency(s.p95)}`,
    `p99=${formatLatency(s.p99)}`,
    `max=${formatLatency(s.maxLatency)}`,
  ].join(' ');
}

export function formatSummary(s: ScenarioSummary): string[] {
  const lines = [formatSummaryLine(s)];
  if (s.sampleError !== undefined) {
    lines.push(`  err_sample: ${s.sampleError}`);
  }
  if (s.setupFailures) {
    lines.push(`  setup_failed: ${s.setupFailures.length} worker(s), first: ${s.setupFailures[0]}`);
  }
  return lines;
}

export const CSV_HEADER = 'label,total,succeeded,failed,success_rate,throughput_rps,avg_ms,p50_ms,p95_ms,p99_ms,max_ms';

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvLatency(ms: number | null): string {
  return ms === null ? '' : ms.toFixed(2);
}

export function formatCsvRow(s: ScenarioSummary): string {
  return [
    csvField(s.label),
    s.total,
    s.succeeded,
    s.failed,
    (s.successRate * 100).toFixed(2),
    s.throughput.toFixed(2),
    csvLatency(s.meanLatency),
    csvLatency(s.p50),
    csvLatency(s.p95),
    csvLatency(s.p99),
    csvLatency(s.maxLatency),
  ].join(',');
}

function printLine(s: ScenarioSummary): void {
  const [line, ...detail] = formatSummary(s);
  console.log(s.failed > 0 || s.setupFailures ? chalk.yellow(line) : line);
  for (const errorLine of detail) {
    console.log(chalk.red(errorLine));
  }
}

export function printSeparator(): void {
  console.log(chalk.gray('-'.repeat(110)));
}

export function printResults(summaries: ScenarioSummary[], options: ReporterOptions = { format: 'line' }): void {
  switch (options.format) {
    case 'json':
      console.log(JSON.stringify(summaries, null, 2));
      break;
    case 'csv':
      console.log(CSV_HEADER);
      for (const s of summaries) {
        console.log(formatCsvRow(s));
      }
      break;
    default:
      for (const s of summaries) {
        printLine(s);
      }
  }
}
