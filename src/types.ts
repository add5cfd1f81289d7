export interface ClientConfig {
  readonly endpoint: string;
  readonly timeoutMs: number;
}

export interface ClientHandle {
  close(): void | Promise<void>;
}

export interface CallOutcome {
  readonly success: boolean;
  readonly latency: number;
  readonly error?: string;
  readonly errorCode?: string;
}

/**
 * One unit of work against a handle. Resolving means success; rejecting (or
 * throwing) means the call failed, whatever the cause.
 */
export type Operation<H> = (handle: H) => Promise<unknown>;

export interface LoadResult {
  outcomes: CallOutcome[];
  /** Milliseconds from worker dispatch until the last worker finished. */
  wallTime: number;
  /** Workers that could not obtain a handle and issued no calls. */
  setupFailures: string[];
}

export interface ScenarioSummary {
  label: string;
  total: number;
  succeeded: number;
  failed: number;
  successRate: number;
  /** Outcomes per second of wall time. */
  throughput: number;
  // Latency fields are null when no call succeeded.
  meanLatency: number | null;
  p50: number | null;
  p95: number | null;
  p99: number | null;
  maxLatency: number | null;
  sampleError?: string;
  errorCodes: Record<string, number>;
  /** Workers that never started; set only when there were any. */
  setupFailures?: string[];
}

export type BenchmarkKind = 'rerank' | 'score';

export const BENCHMARK_KINDS: readonly BenchmarkKind[] = ['rerank', 'score'];
