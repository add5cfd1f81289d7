import { CallOutcome, ScenarioSummary } from './types.js';

export const SAMPLE_ERROR_LENGTH = 200;

/**
 * 1-based nearest rank, ceil(p / 100 * n), computed on integers. `p` is read
 * from its decimal digits as P / 10^k, so the rank is ceil(P * n / (100 * 10^k))
 * in bigint arithmetic and p = 95, n = 20 gives exactly 19.
 */
export function nearestRank(p: number, n: number): number {
  if (p <= 0) {
    return 1;
  }
  if (p >= 100) {
    return n;
  }
  const match = /^(\d+)(?:\.(\d+))?(?:e([+-]\d+))?$/.exec(String(p));
  if (!match) {
    throw new RangeError(`percentile must be a finite number, got ${p}`);
  }
  const fraction = match[2] ?? '';
  const exponent = Number(match[3] ?? '0') - fraction.length;
  let numerator = BigInt(match[1] + fraction);
  let denominator = 100n;
  if (exponent >= 0) {
    numerator *= 10n ** BigInt(exponent);
  } else {
    denominator *= 10n ** BigInt(-exponent);
  }
  const rank = Number((numerator * BigInt(n) + denominator - 1n) / denominator);
  return Math.max(1, Math.min(rank, n));
}

/**
 * Nearest-rank percentile of an ascending array. No interpolation: the
 * result is always one of the values. NaN for an empty array.
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return Number.NaN;
  }
  if (p <= 0) {
    return sorted[0];
  }
  if (p >= 100) {
    return sorted[sorted.length - 1];
  }
  return sorted[nearestRank(p, sorted.length) - 1];
}

export function summarize(label: string, outcomes: readonly CallOutcome[], wallTime: number): ScenarioSummary {
  const total = outcomes.length;
  const latencies = outcomes
    .filter(o => o.success)
    .map(o => o.latency)
    .sort((a, b) => a - b);
  const succeeded = latencies.length;
  const failed = total - succeeded;

  const errorCodes: Record<string, number> = {};
  for (const outcome of outcomes) {
    if (!outcome.success) {
      const code = outcome.errorCode ?? 'UNKNOWN';
      errorCodes[code] = (errorCodes[code] ?? 0) + 1;
    }
  }

  const stat = (value: number): number | null => (succeeded > 0 ? value : null);
  const sum = latencies.reduce((a, b) => a + b, 0);

  const summary: ScenarioSummary = {
    label,
    total,
    succeeded,
    failed,
    successRate: total > 0 ? succeeded / total : 0,
    throughput: wallTime > 0 ? total / (wallTime / 1000) : 0,
    meanLatency: stat(sum / succeeded),
    p50: stat(percentile(latencies, 50)),
    p95: stat(percentile(latencies, 95)),
    p99: stat(percentile(latencies, 99)),
    maxLatency: stat(latencies[latencies.length - 1]),
    errorCodes,
  };

  const firstFailure = outcomes.find(o => !o.success);
  if (firstFailure) {
    summary.sampleError = (firstFailure.error ?? '').slice(0, SAMPLE_ERROR_LENGTH);
  }

  return summary;
}
