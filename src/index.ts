#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, parseIntList, parseNonNegativeInt, parsePositiveInt, resolveClientConfig } from './config.js';
import { ClientPool } from './client-pool.js';
import { createLogger } from './logger.js';
import { RerankClient } from './rerank-client.js';
import { isOutputFormat, printResults, printSeparator, OUTPUT_FORMATS } from './reporter.js';
import { DEFAULT_QUERY, benchmarkExitCode, runBenchmark } from './scenarios/index.js';
import { BENCHMARK_KINDS, BenchmarkKind } from './types.js';

function parseKinds(value: string): BenchmarkKind[] {
  const kinds: BenchmarkKind[] = [];
  for (const name of value.split(',').map(s => s.trim()).filter(s => s.length > 0)) {
    const kind = BENCHMARK_KINDS.find(k => k === name);
    if (!kind) {
      throw new Error(`Unknown kind "${name}". Available: ${BENCHMARK_KINDS.join(', ')}`);
    }
    kinds.push(kind);
  }
  if (kinds.length === 0) {
    throw new Error('At least one kind is required');
  }
  return kinds;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(error: unknown): never {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('An unknown error occurred');
  }
  process.exit(2);
}

const program = new Command();

program
  .name('rerank-bench')
  .description('Benchmark a rerank/score HTTP service under concurrent load')
  .version('1.0.0');

program
  .command('bench')
  .description('Run rerank and score scenarios at each concurrency level')
  .option('-c, --concurrency <list>', 'Comma-separated concurrency levels (default: BENCH_CONCURRENCY or 50,100,150)')
  .option('-n, --calls <number>', 'Sequential calls per worker')
  .option('--warmup <number>', 'Warm-up calls before the first level of each kind')
  .option('--docs <number>', 'Documents per request')
  .option('--top-n <number>', 'top_n sent with rerank requests')
  .option('--kinds <list>', 'Kinds to benchmark', BENCHMARK_KINDS.join(','))
  .option('--url <url>', 'Service base URL, e.g. http://127.0.0.1:11438/v1')
  .option('--timeout <ms>', 'Per-request timeout in milliseconds')
  .option('--model <name>', 'Served model name')
  .option('-o, --output <format>', `Output format: ${OUTPUT_FORMATS.join(', ')}`, 'line')
  .option('--verbose', 'Log warm-up and scenario progress')
  .action(async (options) => {
    try {
      const cfg = loadConfig();
      const format: string = options.output;
      if (!isOutputFormat(format)) {
        throw new Error(`Unknown output format "${format}". Available: ${OUTPUT_FORMATS.join(', ')}`);
      }
      const logger = createLogger({ verbose: options.verbose });

      const clientConfig = resolveClientConfig({
        endpoint: options.url ?? cfg.baseUrl,
        timeoutMs: options.timeout ? parsePositiveInt(options.timeout, '--timeout') : cfg.timeoutMs,
      });
      const levels = options.concurrency ? parseIntList(options.concurrency, '--concurrency') : cfg.concurrencyLevels;
      const callsPerWorker = options.calls ? parsePositiveInt(options.calls, '--calls') : cfg.callsPerWorker;
      const pool = new ClientPool<RerankClient>({ create: config => new RerankClient(config), logger });

      if (format === 'line') {
        console.log(chalk.bold(`Benchmarking ${clientConfig.endpoint}`));
        console.log(chalk.gray(`levels=${levels.join(',')} calls/worker=${callsPerWorker} timeout=${clientConfig.timeoutMs}ms`));
      }

      const summaries = await runBenchmark({
        pool,
        clientConfig,
        levels,
        callsPerWorker,
        warmup: options.warmup ? parseNonNegativeInt(options.warmup, '--warmup') : cfg.warmup,
        kinds: parseKinds(options.kinds),
        documents: options.docs ? parsePositiveInt(options.docs, '--docs') : cfg.documents,
        topN: options.topN ? parsePositiveInt(options.topN, '--top-n') : cfg.topN,
        model: options.model ?? cfg.model,
        logger,
        onLevelComplete: (_, levelSummaries) => {
          if (format === 'line') {
            printResults(levelSummaries, { format });
            printSeparator();
          }
        },
      }).finally(() => pool.releaseAll());

      if (format !== 'line') {
        printResults(summaries, { format });
      }

      process.exit(benchmarkExitCode(summaries));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('rerank')
  .description('Send one rerank request and print the ranking')
  .option('-q, --query <text>', 'Query text', DEFAULT_QUERY)
  .option('-d, --doc <text>', 'Document (repeatable)', collect, [])
  .option('--top-n <number>', 'Number of results to return')
  .option('--url <url>', 'Service base URL')
  .option('--model <name>', 'Served model name')
  .action(async (options) => {
    const cfg = loadConfig();
    const client = new RerankClient(resolveClientConfig({ endpoint: options.url ?? cfg.baseUrl, timeoutMs: cfg.timeoutMs }));
    try {
      const { ranked, scoresAligned } = await client.rerank({
        query: options.query,
        documents: options.doc,
        topN: options.topN ? parsePositiveInt(options.topN, '--top-n') : undefined,
        model: options.model ?? cfg.model,
      });
      console.log(chalk.bold('Rerank results:'));
      for (const item of ranked) {
        console.log(`- score=${item.score.toFixed(4)} | idx=${item.index} | doc=${item.document}`);
      }
      console.log(chalk.gray(`scores aligned: ${JSON.stringify(scoresAligned)}`));
    } catch (error) {
      fail(error);
    } finally {
      client.close();
    }
  });

program
  .command('score')
  .description('Send one score request and print a score per document')
  .option('-q, --query <text>', 'Query text', DEFAULT_QUERY)
  .option('-d, --doc <text>', 'Document (repeatable)', collect, [])
  .option('--url <url>', 'Service base URL')
  .option('--model <name>', 'Served model name')
  .action(async (options) => {
    const cfg = loadConfig();
    const client = new RerankClient(resolveClientConfig({ endpoint: options.url ?? cfg.baseUrl, timeoutMs: cfg.timeoutMs }));
    try {
      const { items } = await client.score({
        query: options.query,
        documents: options.doc,
        model: options.model ?? cfg.model,
      });
      console.log(chalk.bold('Score results (input order):'));
      for (const item of items) {
        console.log(`- score=${item.score.toFixed(4)} | idx=${item.index} | doc=${item.document}`);
      }
    } catch (error) {
      fail(error);
    } finally {
      client.close();
    }
  });

program.parseAsync().catch(fail);
