import { describeError, executeCall } from './executor.js';
import { Logger, silentLogger } from './logger.js';
import { CallOutcome, LoadResult, Operation } from './types.js';

export interface WarmupOptions<H> {
  calls: number;
  /** Handle for the warm-up calls; usually the pool's shared client. */
  acquire: () => H | Promise<H>;
}

export interface LoadOptions<H> {
  concurrency: number;
  callsPerWorker: number;
  operation: Operation<H>;
  /**
   * Called once per worker. Every worker must get its own handle: the handle
   * is used for that worker's sequential calls only and is never shared with
   * another worker, so it needs no locking of its own.
   */
  openHandle: () => H | Promise<H>;
  /** Receives each worker's handle once the worker is done with it. */
  closeHandle?: (handle: H) => void | Promise<void>;
  warmup?: WarmupOptions<H>;
  logger?: Logger;
  now?: () => number;
}

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

async function runWarmup<H>(options: LoadOptions<H>, warmup: WarmupOptions<H>, logger: Logger): Promise<void> {
  let handle: H;
  try {
    handle = await warmup.acquire();
  } catch (error) {
    logger.warn(`Warm-up skipped, no client: ${describeError(error)}`);
    return;
  }

  logger.debug(`Warming up with ${warmup.calls} calls...`);
  for (let i = 0; i < warmup.calls; i++) {
    const outcome = await executeCall(handle, options.operation, { now: options.now });
    if (!outcome.success) {
      logger.warn(`Warm-up call ${i + 1}/${warmup.calls} failed: ${outcome.error}`);
    }
  }
}

/**
 * Runs `concurrency` workers, each issuing `callsPerWorker` sequential calls
 * on its own handle, and collects every outcome.
 *
 * Outcomes arrive worker by worker in completion order; within one worker
 * they keep the order the calls were issued in. A worker that cannot open a
 * handle issues no calls and is reported in `setupFailures`.
 */
export async function runLoad<H>(options: LoadOptions<H>): Promise<LoadResult> {
  assertPositiveInt(options.concurrency, 'concurrency');
  assertPositiveInt(options.callsPerWorker, 'callsPerWorker');

  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => performance.now());

  if (options.warmup && options.warmup.calls > 0) {
    await runWarmup(options, options.warmup, logger);
  }

  const outcomes: CallOutcome[] = [];
  const setupFailures: string[] = [];

  const worker = async (id: number): Promise<CallOutcome[]> => {
    let handle: H;
    try {
      handle = await options.openHandle();
    } catch (error) {
      const message = `worker ${id}: ${describeError(error)}`;
      setupFailures.push(message);
      logger.error(`Could not open client, aborting ${message}`);
      return [];
    }

    const results: CallOutcome[] = [];
    try {
      for (let i = 0; i < options.callsPerWorker; i++) {
        results.push(await executeCall(handle, options.operation, { now }));
      }
    } finally {
      if (options.closeHandle) {
        try {
          await options.closeHandle(handle);
        } catch (error) {
          logger.warn(`worker ${id}: failed to close client: ${describeError(error)}`);
        }
      }
    }
    return results;
  };

  const start = now();
  const workers: Promise<void>[] = [];
  for (let id = 0; id < options.concurrency; id++) {
    workers.push(worker(id).then(results => {
      outcomes.push(...results);
    }));
  }
  await Promise.all(workers);
  const wallTime = now() - start;

  return { outcomes, wallTime, setupFailures };
}
