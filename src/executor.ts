import { RerankError } from './rerank-client.js';
import { CallOutcome, Operation } from './types.js';

export interface ExecuteOptions {
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  return String(error);
}

export function errorCodeOf(error: unknown): string {
  if (error instanceof RerankError) {
    return error.code || (error.statusCode ? `HTTP_${error.statusCode}` : 'UNKNOWN');
  }
  return 'UNKNOWN';
}

/**
 * Runs one timed call. Whatever the operation throws is turned into a failed
 * outcome; this function never rejects.
 */
export async function executeCall<H>(
  handle: H,
  operation: Operation<H>,
  options: ExecuteOptions = {},
): Promise<CallOutcome> {
  const now = options.now ?? (() => performance.now());
  const start = now();
  try {
    await operation(handle);
    return { success: true, latency: now() - start };
  } catch (error) {
    const latency = now() - start;
    return {
      success: false,
      latency,
      error: describeError(error),
      errorCode: errorCodeOf(error),
    };
  }
}
