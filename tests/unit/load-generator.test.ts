/**
 * Unit Tests: runLoad fan-out, handle ownership, warm-up and setup failures.
 */
import { describe, it, expect, vi } from 'vitest';
import { runLoad } from '../../src/load-generator.js';
import { Logger } from '../../src/logger.js';
import { steppingClock } from '../helpers/mock-fetch.js';

interface WorkerHandle {
  id: number;
  calls: number[];
  closed: boolean;
}

function handleFactory() {
  const opened: WorkerHandle[] = [];
  const openHandle = async (): Promise<WorkerHandle> => {
    const handle: WorkerHandle = { id: opened.length, calls: [], closed: false };
    opened.push(handle);
    return handle;
  };
  return { opened, openHandle };
}

function recordingLogger() {
  const lines: Record<'warn' | 'error', string[]> = { warn: [], error: [] };
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: message => lines.warn.push(message),
    error: message => lines.error.push(message),
  };
  return { logger, lines };
}

const tick = () => new Promise(resolve => setTimeout(resolve, 1));

describe('runLoad', () => {
  it('returns concurrency x callsPerWorker outcomes', async () => {
    const { openHandle } = handleFactory();
    let n = 0;
    const result = await runLoad({
      concurrency: 50,
      callsPerWorker: 5,
      openHandle,
      operation: async () => {
        await tick();
        if (++n % 3 === 0) {
          throw new Error('every third call fails');
        }
      },
    });

    expect(result.outcomes).toHaveLength(250);
    expect(result.outcomes.filter(o => !o.success)).toHaveLength(83);
    expect(result.setupFailures).toEqual([]);
  });

  it('opens one private handle per worker', async () => {
    const { opened, openHandle } = handleFactory();
    await runLoad<WorkerHandle>({
      concurrency: 4,
      callsPerWorker: 3,
      openHandle,
      operation: async handle => {
        handle.calls.push(handle.calls.length);
        await tick();
      },
    });

    expect(opened).toHaveLength(4);
    expect(new Set(opened).size).toBe(4);
    for (const handle of opened) {
      expect(handle.calls).toEqual([0, 1, 2]);
    }
  });

  it('runs workers concurrently', async () => {
    const { openHandle } = handleFactory();
    let active = 0;
    let peak = 0;

    await runLoad({
      concurrency: 10,
      callsPerWorker: 2,
      openHandle,
      operation: async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
      },
    });

    expect(peak).toBe(10);
  });

  it('keeps issuance order within a worker', async () => {
    const { openHandle } = handleFactory();
    let seq = 0;
    const result = await runLoad<WorkerHandle>({
      concurrency: 1,
      callsPerWorker: 4,
      openHandle,
      operation: async () => {
        const index = seq++;
        if (index % 2 === 1) {
          throw new Error(`call ${index}`);
        }
      },
    });

    expect(result.outcomes.map(o => o.error)).toEqual([undefined, 'Error: call 1', undefined, 'Error: call 3']);
  });

  it('closes each worker handle after its calls', async () => {
    const { opened, openHandle } = handleFactory();
    const closeHandle = vi.fn((handle: WorkerHandle) => {
      handle.closed = true;
    });

    await runLoad({ concurrency: 3, callsPerWorker: 2, openHandle, closeHandle, operation: async () => undefined });

    expect(closeHandle).toHaveBeenCalledTimes(3);
    expect(opened.every(h => h.closed)).toBe(true);
  });

  it('logs close failures without failing the run', async () => {
    const { openHandle } = handleFactory();
    const { logger, lines } = recordingLogger();

    const result = await runLoad({
      concurrency: 1,
      callsPerWorker: 1,
      openHandle,
      closeHandle: () => {
        throw new Error('already closed');
      },
      operation: async () => undefined,
      logger,
    });

    expect(result.outcomes).toHaveLength(1);
    expect(lines.warn).toEqual(['worker 0: failed to close client: Error: already closed']);
  });

  it('measures wall time from dispatch to the last outcome', async () => {
    const { openHandle } = handleFactory();
    const result = await runLoad({
      concurrency: 2,
      callsPerWorker: 1,
      openHandle,
      operation: async () => undefined,
      // Six reads: dispatch, a start and an end per call, final join.
      now: steppingClock(10),
    });

    expect(result.wallTime).toBe(50);
  });

  it('aborts only the worker whose handle could not be opened', async () => {
    const { logger, lines } = recordingLogger();
    let opens = 0;
    const result = await runLoad({
      concurrency: 3,
      callsPerWorker: 2,
      openHandle: async () => {
        if (opens++ === 1) {
          throw new Error('connection refused');
        }
        return {};
      },
      operation: async () => undefined,
      logger,
    });

    expect(result.outcomes).toHaveLength(4);
    expect(result.setupFailures).toEqual(['worker 1: Error: connection refused']);
    expect(lines.error).toEqual(['Could not open client, aborting worker 1: Error: connection refused']);
  });

  it('records every failure when the operation always fails', async () => {
    const { openHandle } = handleFactory();
    const result = await runLoad({
      concurrency: 10,
      callsPerWorker: 1,
      openHandle,
      operation: async () => {
        throw new Error('boom');
      },
    });

    expect(result.outcomes).toHaveLength(10);
    expect(result.outcomes.every(o => !o.success && o.error === 'Error: boom')).toBe(true);
  });

  it('rejects non-positive sizes', async () => {
    const { openHandle } = handleFactory();
    await expect(runLoad({ concurrency: 0, callsPerWorker: 1, openHandle, operation: async () => undefined }))
      .rejects.toThrow(RangeError);
    await expect(runLoad({ concurrency: 1, callsPerWorker: 1.5, openHandle, operation: async () => undefined }))
      .rejects.toThrow('callsPerWorker must be a positive integer, got 1.5');
  });
});

describe('runLoad warm-up', () => {
  it('runs warm-up calls on the given handle before the timed run', async () => {
    const { openHandle } = handleFactory();
    const shared: WorkerHandle = { id: -1, calls: [], closed: false };
    const seen: number[] = [];

    const result = await runLoad<WorkerHandle>({
      concurrency: 2,
      callsPerWorker: 1,
      openHandle,
      warmup: { calls: 3, acquire: () => shared },
      operation: async handle => {
        seen.push(handle.id);
      },
    });

    expect(seen).toEqual([-1, -1, -1, 0, 1]);
    expect(result.outcomes).toHaveLength(2);
  });

  it('logs warm-up failures and continues', async () => {
    const { openHandle } = handleFactory();
    const { logger, lines } = recordingLogger();
    let call = 0;

    const result = await runLoad({
      concurrency: 1,
      callsPerWorker: 1,
      openHandle,
      warmup: { calls: 2, acquire: openHandle },
      operation: async () => {
        if (call++ === 0) {
          throw new Error('cold start');
        }
      },
      logger,
    });

    expect(lines.warn).toEqual(['Warm-up call 1/2 failed: Error: cold start']);
    expect(result.outcomes).toEqual([{ success: true, latency: expect.any(Number) }]);
  });

  it('skips warm-up when its handle cannot be acquired', async () => {
    const { openHandle } = handleFactory();
    const { logger, lines } = recordingLogger();

    const result = await runLoad({
      concurrency: 1,
      callsPerWorker: 1,
      openHandle,
      warmup: {
        calls: 2,
        acquire: () => {
          throw new Error('pool closed');
        },
      },
      operation: async () => undefined,
      logger,
    });

    expect(lines.warn).toEqual(['Warm-up skipped, no client: Error: pool closed']);
    expect(result.outcomes).toHaveLength(1);
  });
});
