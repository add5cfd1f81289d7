import { sameClientConfig } from './config.js';
import { Logger, silentLogger } from './logger.js';
import { ClientConfig, ClientHandle } from './types.js';

export class ReleaseError extends Error {
  readonly config: ClientConfig;

  constructor(config: ClientConfig, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to release client for ${config.endpoint}: ${reason}`, { cause });
    this.name = 'ReleaseError';
    this.config = config;
  }
}

export type ReleaseResult = { ok: true } | { ok: false; error: ReleaseError };

export async function releaseHandle(handle: ClientHandle, config: ClientConfig): Promise<ReleaseResult> {
  try {
    await handle.close();
    return { ok: true };
  } catch (error) {
    return { ok: false, error: new ReleaseError(config, error) };
  }
}

/** FIFO async lock; each operation starts after the previous one settles. */
class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    await previous;
    try {
      return await operation();
    } finally {
      release();
    }
  }
}

export interface ClientPoolOptions<H extends ClientHandle> {
  create: (config: ClientConfig) => H | Promise<H>;
  logger?: Logger;
}

interface Slot<H> {
  config: ClientConfig;
  handle: H;
}

/**
 * Caches a single reusable client handle keyed by its config.
 *
 * Asking for the cached config returns the cached handle. Asking for a
 * different one releases the cached handle before the new one is created, so
 * a pool never holds two live handles.
 */
export class ClientPool<H extends ClientHandle> {
  private slot: Slot<H> | undefined;
  private readonly mutex = new AsyncMutex();
  private readonly create: (config: ClientConfig) => H | Promise<H>;
  private readonly logger: Logger;

  constructor(options: ClientPoolOptions<H>) {
    this.create = options.create;
    this.logger = options.logger ?? silentLogger;
  }

  get current(): ClientConfig | undefined {
    return this.slot?.config;
  }

  async acquire(config: ClientConfig): Promise<H> {
    const cached = this.slot;
    if (cached && sameClientConfig(cached.config, config)) {
      return cached.handle;
    }

    return this.mutex.runExclusive(async () => {
      // Another caller may have installed this config while we waited.
      if (this.slot && sameClientConfig(this.slot.config, config)) {
        return this.slot.handle;
      }

      await this.retire();

      const handle = await this.create(config);
      this.slot = { config, handle };
      this.logger.debug(`Created client for ${config.endpoint} (timeout ${config.timeoutMs}ms)`);
      return handle;
    });
  }

  async releaseAll(): Promise<void> {
    await this.mutex.runExclusive(() => this.retire());
  }

  // Must run under the mutex.
  private async retire(): Promise<void> {
    const previous = this.slot;
    if (!previous) {
      return;
    }
    this.slot = undefined;

    const result = await releaseHandle(previous.handle, previous.config);
    if (!result.ok) {
      this.logger.warn(result.error.message);
    }
  }
}
