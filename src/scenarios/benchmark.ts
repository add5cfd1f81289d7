import { ClientPool } from '../client-pool.js';
import { runLoad } from '../load-generator.js';
import { Logger, silentLogger } from '../logger.js';
import { summarize } from '../metrics.js';
import { RerankClient } from '../rerank-client.js';
import { BenchmarkKind, ClientConfig, Operation, ScenarioSummary } from '../types.js';
import { DEFAULT_QUERY, makeDocuments, operationFor } from './operations.js';

export interface BenchmarkOptions {
  pool: ClientPool<RerankClient>;
  clientConfig: ClientConfig;
  levels: number[];
  callsPerWorker: number;
  warmup: number;
  kinds: BenchmarkKind[];
  documents?: number;
  topN?: number;
  model?: string;
  query?: string;
  /** Builds the operation for a kind; defaults to the rerank/score operations. */
  operations?: Partial<Record<BenchmarkKind, Operation<RerankClient>>>;
  /** Creates each worker's private client. */
  createWorkerClient?: (config: ClientConfig) => RerankClient;
  onSummary?: (summary: ScenarioSummary) => void;
  onLevelComplete?: (level: number, summaries: ScenarioSummary[]) => void;
  logger?: Logger;
  now?: () => number;
}

export function scenarioLabel(kind: BenchmarkKind, concurrency: number, total: number): string {
  return `${kind.padEnd(6)} | conc=${concurrency} | total=${total}`;
}

/** 2 when any worker could not start, 1 when any call failed, otherwise 0. */
export function benchmarkExitCode(summaries: readonly ScenarioSummary[]): number {
  if (summaries.some(s => s.setupFailures)) {
    return 2;
  }
  return summaries.some(s => s.failed > 0) ? 1 : 0;
}

/**
 * Runs every (kind, concurrency level) scenario in order and returns one
 * summary per scenario.
 *
 * Warm-up calls go through the pool's shared client before the first level
 * of each kind. Timed calls use one fresh client per worker, built from the
 * shared client's config.
 */
export async function runBenchmark(options: BenchmarkOptions): Promise<ScenarioSummary[]> {
  const logger = options.logger ?? silentLogger;
  const createWorkerClient = options.createWorkerClient ?? (config => new RerankClient(config));
  const operationOptions = {
    query: options.query ?? DEFAULT_QUERY,
    documents: makeDocuments(options.documents ?? 16),
    topN: options.topN ?? 10,
    model: options.model,
    timeoutMs: options.clientConfig.timeoutMs,
  };

  const operations = new Map<BenchmarkKind, Operation<RerankClient>>();
  for (const kind of options.kinds) {
    operations.set(kind, options.operations?.[kind] ?? operationFor(kind, operationOptions));
  }

  const summaries: ScenarioSummary[] = [];
  const warmedUp = new Set<BenchmarkKind>();

  for (const level of options.levels) {
    const levelSummaries: ScenarioSummary[] = [];

    for (const [kind, operation] of operations) {
      const total = level * options.callsPerWorker;
      logger.debug(`Running ${kind}: ${total} calls @ ${level} concurrency`);

      const warmup = warmedUp.has(kind) || options.warmup <= 0
        ? undefined
        : { calls: options.warmup, acquire: () => options.pool.acquire(options.clientConfig) };
      warmedUp.add(kind);

      const result = await runLoad<RerankClient>({
        concurrency: level,
        callsPerWorker: options.callsPerWorker,
        operation,
        openHandle: async () => {
          const shared = await options.pool.acquire(options.clientConfig);
          return createWorkerClient(shared.config);
        },
        closeHandle: client => client.close(),
        warmup,
        logger,
        now: options.now,
      });

      if (result.setupFailures.length > 0) {
        logger.warn(`${kind} @ ${level}: ${result.setupFailures.length} worker(s) failed to start`);
      }

      const summary = summarize(scenarioLabel(kind, level, total), result.outcomes, result.wallTime);
      if (result.setupFailures.length > 0) {
        summary.setupFailures = result.setupFailures;
      }
      summaries.push(summary);
      levelSummaries.push(summary);
      options.onSummary?.(summary);
    }

    options.onLevelComplete?.(level, levelSummaries);
  }

  return summaries;
}
