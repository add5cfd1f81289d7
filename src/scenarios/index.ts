export { benchmarkExitCode, runBenchmark, scenarioLabel } from './benchmark.js';
export type { BenchmarkOptions } from './benchmark.js';
export {
  DEFAULT_QUERY,
  makeDocuments,
  operationFor,
  rerankOperation,
  scoreOperation,
} from './operations.js';
export type { OperationOptions } from './operations.js';
