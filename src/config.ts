import { config } from 'dotenv';
import { ClientConfig } from './types.js';

config();

export const DEFAULT_ENDPOINT = 'http://127.0.0.1:11438/v1';
export const DEFAULT_TIMEOUT_MS = 30000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface BenchConfig {
  baseUrl: string;
  timeoutMs: number;
  model?: string;
  concurrencyLevels: number[];
  callsPerWorker: number;
  warmup: number;
  documents: number;
  topN: number;
}

type Env = Record<string, string | undefined>;

export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

/** Parses "50,100,150" into [50, 100, 150], keeping the given order. */
export function parseIntList(value: string, name: string): number[] {
  const parts = value.split(',').map(s => s.trim()).filter(s => s.length > 0);
  if (parts.length === 0) {
    throw new ConfigError(`${name} must list at least one value`);
  }
  return parts.map(part => parsePositiveInt(part, name));
}

function read(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

export function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Resolves an optional endpoint/timeout pair into the immutable config the
 * client pool is keyed on.
 */
export function resolveClientConfig(options: { endpoint?: string; timeoutMs?: number } = {}): ClientConfig {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigError(`timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }
  return Object.freeze({
    endpoint: stripTrailingSlashes(options.endpoint || DEFAULT_ENDPOINT),
    timeoutMs,
  });
}

export function sameClientConfig(a: ClientConfig, b: ClientConfig): boolean {
  return a.endpoint === b.endpoint && a.timeoutMs === b.timeoutMs;
}

export function loadConfig(env: Env = process.env): BenchConfig {
  const timeout = read(env, 'RERANK_TIMEOUT_MS');
  const concurrency = read(env, 'BENCH_CONCURRENCY');
  const calls = read(env, 'BENCH_CALLS_PER_WORKER');
  const warmup = read(env, 'BENCH_WARMUP');
  const documents = read(env, 'BENCH_DOCS');
  const topN = read(env, 'BENCH_TOP_N');

  return {
    baseUrl: stripTrailingSlashes(read(env, 'RERANK_BASE_URL') ?? DEFAULT_ENDPOINT),
    timeoutMs: timeout ? parsePositiveInt(timeout, 'RERANK_TIMEOUT_MS') : DEFAULT_TIMEOUT_MS,
    model: read(env, 'RERANK_MODEL'),
    concurrencyLevels: concurrency ? parseIntList(concurrency, 'BENCH_CONCURRENCY') : [50, 100, 150],
    callsPerWorker: calls ? parsePositiveInt(calls, 'BENCH_CALLS_PER_WORKER') : 5,
    warmup: warmup ? parseNonNegativeInt(warmup, 'BENCH_WARMUP') : 2,
    documents: documents ? parsePositiveInt(documents, 'BENCH_DOCS') : 16,
    topN: topN ? parsePositiveInt(topN, 'BENCH_TOP_N') : 10,
  };
}
