import { z } from 'zod';
import { ClientConfig, ClientHandle } from './types.js';

export class RerankError extends Error {
  code?: string;
  statusCode: number;

  constructor(message: string, code?: string, statusCode: number = 500) {
    super(message);
    this.name = 'RerankError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export interface RerankItem {
  /** Position of the document in the request. */
  index: number;
  score: number;
  document: string;
}

export interface RerankRequest {
  query: string;
  documents: string[];
  topN?: number;
  model?: string;
  timeoutMs?: number;
}

export interface ScoreRequest {
  query: string;
  documents: string[];
  model?: string;
  timeoutMs?: number;
}

export interface RerankResponse {
  /** Sorted by the server, most relevant first. */
  ranked: RerankItem[];
  /** One entry per input document; null where the server returned nothing. */
  scoresAligned: (number | null)[];
  raw: unknown;
}

export interface ScoreResponse {
  /** Input order, not sorted. */
  items: RerankItem[];
  scores: number[];
  raw: unknown;
}

const rerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int(),
      relevance_score: z.number().optional(),
      document: z.object({ text: z.string().optional() }).nullish(),
    }),
  ),
});

const scoreResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      score: z.number(),
    }),
  ),
});

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

/**
 * HTTP client for an OpenAI-compatible rerank server (`/rerank`, `/score`).
 *
 * A client is bound to one {@link ClientConfig}. `close()` aborts anything in
 * flight and makes further calls fail with `CLIENT_CLOSED`.
 */
export class RerankClient implements ClientHandle {
  readonly config: ClientConfig;
  private readonly lifetime = new AbortController();

  constructor(config: ClientConfig) {
    this.config = config;
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  async rerank(request: RerankRequest): Promise<RerankResponse> {
    if (request.documents.length === 0) {
      return { ranked: [], scoresAligned: [], raw: { results: [] } };
    }

    const payload: Record<string, unknown> = {
      query: request.query,
      documents: request.documents,
    };
    if (request.topN !== undefined) {
      payload.top_n = request.topN;
    }
    if (request.model) {
      payload.model = request.model;
    }

    const url = `${this.config.endpoint}/rerank`;
    const raw = await this.postJson(url, payload, request.timeoutMs);
    const parsed = rerankResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RerankError(`Unexpected response from ${url}: ${parsed.error.message}`, 'INVALID_RESPONSE');
    }

    const scoresAligned: (number | null)[] = request.documents.map(() => null);
    const ranked = parsed.data.results.map(result => {
      const score = result.relevance_score ?? 0;
      const inRange = result.index >= 0 && result.index < scoresAligned.length;
      if (inRange) {
        scoresAligned[result.index] = score;
      }
      const document = result.document?.text || (inRange ? request.documents[result.index] : undefined);
      if (document === undefined) {
        throw new RerankError(
          `Result index ${result.index} out of range for ${request.documents.length} documents from ${url}`,
          'INVALID_RESPONSE',
        );
      }
      return { index: result.index, score, document };
    });

    return { ranked, scoresAligned, raw };
  }

  async score(request: ScoreRequest): Promise<ScoreResponse> {
    if (request.documents.length === 0) {
      return { items: [], scores: [], raw: { data: [] } };
    }

    const payload: Record<string, unknown> = {
      text_1: request.query,
      text_2: request.documents,
    };
    if (request.model) {
      payload.model = request.model;
    }

    const url = `${this.config.endpoint}/score`;
    const raw = await this.postJson(url, payload, request.timeoutMs);
    const parsed = scoreResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RerankError(`Unexpected response from ${url}: ${parsed.error.message}`, 'INVALID_RESPONSE');
    }

    const aligned: (number | null)[] = request.documents.map(() => null);
    for (const entry of parsed.data.data) {
      if (entry.index >= 0 && entry.index < aligned.length) {
        aligned[entry.index] = entry.score;
      }
    }

    const scores: number[] = [];
    for (const value of aligned) {
      if (value === null) {
        throw new RerankError(
          `Incomplete scores from ${url}: ${parsed.data.data.length} of ${request.documents.length} documents scored`,
          'INCOMPLETE_SCORES',
        );
      }
      scores.push(value);
    }

    const items = scores.map((score, index) => ({ index, score, document: request.documents[index] }));
    return { items, scores, raw };
  }

  close(): void {
    if (!this.closed) {
      this.lifetime.abort();
    }
  }

  private async postJson(url: string, payload: Record<string, unknown>, timeoutMs?: number): Promise<unknown> {
    if (this.closed) {
      throw new RerankError('Client has been closed', 'CLIENT_CLOSED');
    }

    const timeout = timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const onClose = () => controller.abort();
    this.lifetime.signal.addEventListener('abort', onClose, { once: true });

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new RerankError(`Request to ${url} timed out after ${timeout}ms`, 'TIMEOUT', 408);
      }
      if (this.closed) {
        throw new RerankError('Client was closed during the request', 'CLIENT_CLOSED');
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new RerankError(`Request to ${url} failed: ${reason}`, 'NETWORK_ERROR', 0);
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener('abort', onClose);
    }

    if (response.status >= 400) {
      throw new RerankError(`HTTP ${response.status} for ${url}: ${text}`, `HTTP_${response.status}`, response.status);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RerankError(
        `Failed to parse JSON from ${url}: ${reason}; text=${truncate(text, 500)}`,
        'INVALID_JSON',
        response.status,
      );
    }
  }
}
