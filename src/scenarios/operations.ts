import { RerankClient } from '../rerank-client.js';
import { BenchmarkKind, Operation } from '../types.js';

export const DEFAULT_QUERY = 'Which river flows through Paris?';

const SAMPLE_DOCUMENTS = [
  'The Seine flows through the centre of Paris.',
  'Lyon sits where the Rhone meets the Saone.',
  'The Loire is the longest river in France.',
  'Paris is the capital and largest city of France.',
  'Bordeaux lies on the Garonne near the Atlantic coast.',
];

export function makeDocuments(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${SAMPLE_DOCUMENTS[i % SAMPLE_DOCUMENTS.length]} (doc_id=${i})`);
}

export interface OperationOptions {
  query: string;
  documents: string[];
  topN?: number;
  model?: string;
  timeoutMs?: number;
}

/** Fails when the server ranks nothing. */
export function rerankOperation(options: OperationOptions): Operation<RerankClient> {
  return async client => {
    const { ranked } = await client.rerank({
      query: options.query,
      documents: options.documents,
      topN: options.topN,
      model: options.model,
      timeoutMs: options.timeoutMs,
    });
    if (ranked.length === 0) {
      throw new Error('empty rerank result');
    }
    return ranked;
  };
}

/** Fails unless every document got a score. */
export function scoreOperation(options: OperationOptions): Operation<RerankClient> {
  return async client => {
    const { scores } = await client.score({
      query: options.query,
      documents: options.documents,
      model: options.model,
      timeoutMs: options.timeoutMs,
    });
    if (scores.length !== options.documents.length) {
      throw new Error(`score len mismatch: ${scores.length} != ${options.documents.length}`);
    }
    return scores;
  };
}

export function operationFor(kind: BenchmarkKind, options: OperationOptions): Operation<RerankClient> {
  return kind === 'rerank' ? rerankOperation(options) : scoreOperation(options);
}
