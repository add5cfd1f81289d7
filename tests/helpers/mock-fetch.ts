/**
 * Shared test helpers for mocking fetch and building rerank server responses.
 * Used by unit and contract tests to avoid real HTTP calls.
 */
import { vi } from 'vitest';
import { RerankClient } from '../../src/rerank-client.js';
import { ClientConfig } from '../../src/types.js';

// ============================================================================
// Fetch Mocking
// ============================================================================

export type MockFetch = ReturnType<typeof createMockFetch>;

export function createMockFetch() {
  return vi.fn<typeof fetch>();
}

const originalFetch = globalThis.fetch;

export function installMockFetch(): MockFetch {
  const mockFetch = createMockFetch();
  globalThis.fetch = mockFetch;
  return mockFetch;
}

export function restoreFetch(): void {
  globalThis.fetch = originalFetch;
}

/** Parsed JSON body of the nth fetch call. */
export function requestBody(mockFetch: MockFetch, call = 0): unknown {
  const init = mockFetch.mock.calls[call]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

export function requestUrl(mockFetch: MockFetch, call = 0): string {
  return String(mockFetch.mock.calls[call]?.[0]);
}

// ============================================================================
// Response Builders
// ============================================================================

export function mockJsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockTextResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

/** Never resolves; rejects with an AbortError once the request is aborted. */
export function hangingFetch(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_, reject) => {
    init?.signal?.addEventListener('abort', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

// ============================================================================
// Fixtures
// ============================================================================

export function mockRerankResult(scores: Array<[index: number, score: number]>) {
  return {
    id: 'rerank-test-1',
    model: 'test-reranker',
    usage: { total_tokens: 42 },
    results: scores.map(([index, relevance_score]) => ({ index, relevance_score })),
  };
}

export function mockScoreResult(scores: number[]) {
  return {
    id: 'score-test-1',
    object: 'list',
    model: 'test-reranker',
    usage: { total_tokens: 42 },
    data: scores.map((score, index) => ({ index, object: 'score', score })),
  };
}

// ============================================================================
// Test Client Factory
// ============================================================================

export const BASE_URL = 'http://rerank.test/v1';

export const TEST_CONFIG: ClientConfig = { endpoint: BASE_URL, timeoutMs: 5000 };

export function createTestClient(config: Partial<ClientConfig> = {}): RerankClient {
  return new RerankClient({ ...TEST_CONFIG, ...config });
}

/** Clock that advances by `step` ms on each read. */
export function steppingClock(step: number, start = 0): () => number {
  let t = start - step;
  return () => {
    t += step;
    return t;
  };
}
