/**
 * Benchmark runner for query parse-and-walk performance
 *
 * Measures parsing time and memory usage across adapters and datasets.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { cpus, totalmem } from 'node:os';
import { join } from 'node:path';
import { argv } from 'node:process';
import { fileURLToPath } from 'node:url';
import { adapters, type ParserAdapter } from './adapters.js';
import { datasets } from './datasets.js';

export interface BenchmarkMetrics {
  parseTimeMs: number;
  memoryDeltaBytes: number;
  throughputCharsPerSecond: number;
  tokenCount?: number;
  fieldCount?: number;
}

export interface BenchmarkResult {
  parser: string;
  version: string;
  dataset: string;
  metrics: BenchmarkMetrics;
  timestamp: Date;
  environment: SystemInfo;
}

export interface SystemInfo {
  nodeVersion: string;
  platform: string;
  cpuModel: string;
  memoryTotal: number;
  arch: string;
}

function getSystemInfo(): SystemInfo {
  return {
    nodeVersion: process.version,
    platform: process.platform,
    cpuModel: cpus()[0]?.model ?? 'unknown',
    memoryTotal: totalmem(),
    arch: process.arch
  };
}

/**
 * Measure parsing performance for a single adapter and content
 */
function measureParse(adapter: ParserAdapter, content: string): BenchmarkMetrics {
  const memBefore = process.memoryUsage().heapUsed;
  const startTime = performance.now();

  const result = adapter.parse(content);

  const parseTimeMs = performance.now() - startTime;
  const memAfter = process.memoryUsage().heapUsed;

  return {
    parseTimeMs,
    memoryDeltaBytes: Math.max(0, memAfter - memBefore),
    throughputCharsPerSecond: content.length / (parseTimeMs / 1000),
    tokenCount: result.tokenCount,
    fieldCount: result.fieldCount
  };
}

/**
 * Run several iterations and keep the median by parse time
 */
function runMultipleIterations(adapter: ParserAdapter, content: string, iterations = 5): BenchmarkMetrics {
  // Warm up
  adapter.parse(content);

  const results: BenchmarkMetrics[] = [];
  for (let i = 0; i < iterations; i++) {
    results.push(measureParse(adapter, content));
  }

  results.sort((a, b) => a.parseTimeMs - b.parseTimeMs);
  return results[Math.floor(results.length / 2)];
}

function runBenchmarkSuite(): BenchmarkResult[] {
  const results: BenchmarkResult[] = [];
  const systemInfo = getSystemInfo();

  console.log('Starting benchmark suite...');
  console.log(`System: ${systemInfo.platform} ${systemInfo.arch}, Node ${systemInfo.nodeVersion}`);
  console.log(`Parsers: ${adapters.map(a => `${a.name}@${a.version}`).join(', ')}`);
  console.log(`Datasets: ${datasets.map(d => `${d.name} (${Math.round(d.size / 1024)}KB)`).join(', ')}`);

  const totalTests = datasets.length * adapters.length;
  let currentTest = 0;

  for (const dataset of datasets) {
    console.log(`\nTesting dataset: ${dataset.name} (${Math.round(dataset.size / 1024)}KB)`);

    for (const adapter of adapters) {
      currentTest++;
      console.log(`  [${currentTest}/${totalTests}] ${adapter.name}...`);

      try {
        const metrics = runMultipleIterations(adapter, dataset.content, 3);

        results.push({
          parser: adapter.name,
          version: adapter.version,
          dataset: dataset.name,
          metrics,
          timestamp: new Date(),
          environment: systemInfo
        });

        console.log(`    ✓ ${metrics.parseTimeMs.toFixed(2)}ms, ${(metrics.throughputCharsPerSecond / 1000).toFixed(0)}k chars/sec`);
      } catch (error) {
        console.log(`    ✗ Error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  return results;
}

function saveResults(results: BenchmarkResult[]): void {
  const directory = join(process.cwd(), 'results');
  mkdirSync(directory, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const filename = join(directory, `benchmark-${timestamp}.json`);

  writeFileSync(filename, JSON.stringify(results, null, 2));
  console.log(`\nResults saved to: ${filename}`);
}

function generateSummary(results: BenchmarkResult[]): void {
  console.log('\n=== BENCHMARK SUMMARY ===\n');

  const byDataset = new Map<string, BenchmarkResult[]>();
  for (const result of results) {
    const group = byDataset.get(result.dataset) ?? [];
    group.push(result);
    byDataset.set(result.dataset, group);
  }

  for (const [datasetName, datasetResults] of byDataset) {
    console.log(`Dataset: ${datasetName}`);

    datasetResults.sort((a, b) => a.metrics.parseTimeMs - b.metrics.parseTimeMs);

    for (const result of datasetResults) {
      const throughputMB = (result.metrics.throughputCharsPerSecond / (1024 * 1024)).toFixed(1);
      const memoryKB = Math.round(result.metrics.memoryDeltaBytes / 1024);
      const fields = result.metrics.fieldCount === undefined ? '' : `  ${result.metrics.fieldCount} fields`;

      console.log(`  ${result.parser.padEnd(14)} ${result.metrics.parseTimeMs.toFixed(2).padStart(8)}ms  ${throughputMB.padStart(6)}MB/s  ${memoryKB.toString().padStart(6)}KB${fields}`);
    }
    console.log('');
  }
}

/**
 * Every walking adapter must see the same number of fields
 */
function verifyFieldCounts(results: BenchmarkResult[]): boolean {
  let consistent = true;

  for (const dataset of datasets) {
    const counts = new Set<number>();
    for (const result of results) {
      if (result.dataset === dataset.name && result.metrics.fieldCount !== undefined) {
        counts.add(result.metrics.fieldCount);
      }
    }
    if (counts.size > 1) {
      console.log(`⚠ Field counts disagree on ${dataset.name}: ${[...counts].join(', ')}`);
      consistent = false;
    }
  }

  if (consistent) console.log('✓ All walkers agree on field counts');
  return consistent;
}

function main(): void {
  const results = runBenchmarkSuite();

  if (results.length === 0) {
    console.log('No benchmark results generated');
    return;
  }

  generateSummary(results);
  saveResults(results);
  if (!verifyFieldCounts(results)) {
    process.exitCode = 1;
  }
}

// Run if this module is executed directly
if (argv[1] === fileURLToPath(import.meta.url)) {
  main();
}
