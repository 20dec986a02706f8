/**
 * @fileoverview Benchmark setup utilities and configuration
 */

import type { BenchOptions } from 'vitest';

/**
 * Standard benchmark options for micro-benchmarks
 * - Warmup ensures JIT compilation optimizations
 * - Higher iterations for statistical significance
 */
export const microBenchOptions: BenchOptions = {
  time: 1000, // 1 second per benchmark
  iterations: 1000,
  warmupTime: 100,
  warmupIterations: 10,
  throws: true,
};

/**
 * Options for benchmarks that fan out to many listeners per iteration
 */
export const fanOutBenchOptions: BenchOptions = {
  time: 2000,
  iterations: 100,
  warmupTime: 200,
  warmupIterations: 5,
  throws: true,
};
