/**
 * Benchmark runner: median parse time, throughput and heap delta for every
 * adapter over every dataset.
 */

import { mkdirSync, writeFileSync } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { performance } from 'perf_hooks';

import type { ParserAdapter, ParseSummary } from './adapters.js';
import type { BenchmarkDataset } from './datasets.js';

export interface BenchmarkMetrics {
  parseTimeMs: number;
  memoryDeltaBytes: number;
  throughputCharsPerSecond: number;
  summary: ParseSummary;
}

export interface BenchmarkResult {
  parser: string;
  dataset: string;
  /** Absent when the parser threw. */
  metrics?: BenchmarkMetrics;
  error?: string;
  timestamp: string;
}

export interface SystemInfo {
  nodeVersion: string;
  platform: string;
  cpuModel: string;
  memoryTotal: number;
  arch: string;
}

export interface BenchmarkSuiteOptions {
  adapters: readonly ParserAdapter[];
  datasets: readonly BenchmarkDataset[];
  iterations?: number;
  log?: (line: string) => void;
}

const DEFAULT_ITERATIONS = 5;

export function getSystemInfo(): SystemInfo {
  return {
    nodeVersion: process.version,
    platform: process.platform,
    cpuModel: os.cpus()[0]?.model ?? 'unknown',
    memoryTotal: os.totalmem(),
    arch: process.arch,
  };
}

/**
 * Time a single parse of the content.
 */
export function measureParse(adapter: ParserAdapter, content: string): BenchmarkMetrics {
  const memBefore = process.memoryUsage().heapUsed;
  const startTime = performance.now();

  const summary = adapter.parse(content);

  const parseTimeMs = performance.now() - startTime;
  const memAfter = process.memoryUsage().heapUsed;

  return {
    parseTimeMs,
    memoryDeltaBytes: Math.max(0, memAfter - memBefore),
    throughputCharsPerSecond: parseTimeMs > 0 ? content.length / (parseTimeMs / 1000) : 0,
    summary,
  };
}

/**
 * Run several iterations and keep the one with the median parse time.
 */
export function runMultipleIterations(adapter: ParserAdapter, content: string, iterations: number): BenchmarkMetrics {
  if (iterations < 1) throw new Error('Benchmark: iterations must be at least 1, got ' + iterations);

  const results: BenchmarkMetrics[] = [];
  for (let i = 0; i < iterations; i++)
    results.push(measureParse(adapter, content));

  results.sort((a, b) => a.parseTimeMs - b.parseTimeMs);
  return results[Math.floor(results.length / 2)];
}

export function runBenchmarkSuite(options: BenchmarkSuiteOptions): BenchmarkResult[] {
  const { adapters, datasets } = options;
  const iterations = options.iterations ?? DEFAULT_ITERATIONS;
  const log = options.log ?? console.log;

  const results: BenchmarkResult[] = [];
  const totalTests = datasets.length * adapters.length;
  let currentTest = 0;

  for (const dataset of datasets) {
    log(`Dataset: ${dataset.name} (${Math.round(dataset.content.length / 1024)}KB)`);

    for (const adapter of adapters) {
      currentTest++;
      const timestamp = new Date().toISOString();
      try {
        const metrics = runMultipleIterations(adapter, dataset.content, iterations);
        results.push({ parser: adapter.name, dataset: dataset.name, metrics, timestamp });
        log(`  [${currentTest}/${totalTests}] ${adapter.name} ${metrics.parseTimeMs.toFixed(2)}ms`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        results.push({ parser: adapter.name, dataset: dataset.name, error: message, timestamp });
        log(`  [${currentTest}/${totalTests}] ${adapter.name} failed: ${message}`);
      }
    }
  }

  return results;
}

/**
 * Per-dataset table, fastest parser first, failures last.
 */
export function formatSummary(results: readonly BenchmarkResult[]): string {
  const byDataset = new Map<string, BenchmarkResult[]>();
  for (const result of results) {
    const group = byDataset.get(result.dataset);
    if (group) group.push(result);
    else byDataset.set(result.dataset, [result]);
  }

  const lines: string[] = [];
  for (const [datasetName, group] of byDataset) {
    lines.push(`Dataset: ${datasetName}`);

    const sorted = [...group].sort((a, b) =>
      (a.metrics?.parseTimeMs ?? Infinity) - (b.metrics?.parseTimeMs ?? Infinity));

    for (const result of sorted) {
      const name = result.parser.padEnd(12);
      if (!result.metrics) {
        lines.push(`  ${name} error: ${result.error ?? 'unknown'}`);
        continue;
      }
      const { parseTimeMs, throughputCharsPerSecond, memoryDeltaBytes, summary } = result.metrics;
      const throughputMB = (throughputCharsPerSecond / (1024 * 1024)).toFixed(1);
      const memoryKB = Math.round(memoryDeltaBytes / 1024);
      lines.push(
        `  ${name} ${parseTimeMs.toFixed(2).padStart(8)}ms  ${throughputMB.padStart(6)}MB/s  ` +
        `${String(memoryKB).padStart(6)}KB  ${summary.size} ${summary.kind}`);
    }
  }
  return lines.join('\n');
}

/**
 * Write results as JSON under `<directory>/benchmark-<timestamp>.json`.
 * @returns the file written
 */
export function saveResults(results: readonly BenchmarkResult[], directory = join(process.cwd(), 'results')): string {
  mkdirSync(directory, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const filename = join(directory, `benchmark-${timestamp}.json`);
  writeFileSync(filename, JSON.stringify({ environment: getSystemInfo(), results }, null, 2));
  return filename;
}

export interface BenchmarkArgs {
  onlyParser: string | undefined;
  onlyDataset: string | undefined;
  iterations: number;
  save: boolean;
}

/**
 * Command line flags: --only-parser=<name> --only-dataset=<name> --iterations=<n> --save
 */
export function parseBenchmarkArgs(argv: readonly string[]): BenchmarkArgs {
  const valueOf = (flag: string) => {
    const arg = argv.find(a => a.startsWith(flag + '='));
    return arg === undefined ? undefined : arg.slice(flag.length + 1);
  };

  const iterationsArg = valueOf('--iterations');
  const iterations = iterationsArg === undefined ? DEFAULT_ITERATIONS : Number(iterationsArg);
  if (!Number.isInteger(iterations) || iterations < 1)
    throw new Error('Benchmark: --iterations expects a positive integer, got ' + JSON.stringify(iterationsArg));

  return {
    onlyParser: valueOf('--only-parser'),
    onlyDataset: valueOf('--only-dataset'),
    iterations,
    save: argv.includes('--save'),
  };
}
