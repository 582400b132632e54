/**
 * Benchmark utility functions
 */

import { Bench } from 'tinybench'
import type { FunctionalEnv, EpisodeInfo, Observation } from '@arcade-gym/envs'
import type { BenchmarkConfig } from './types.js'

/**
 * Format time value for display
 * @param us - Time in microseconds
 */
export function formatTime(us: number): string {
  if (us < 1) {
    return `${(us * 1000).toFixed(1)}ns`
  }
  if (us < 1000) {
    return `${us.toFixed(1)}μs`
  }
  if (us < 1000000) {
    return `${(us / 1000).toFixed(2)}ms`
  }
  return `${(us / 1000000).toFixed(2)}s`
}

/**
 * Format ops/sec for display
 * @param ops - Operations per second
 */
export function formatOps(ops: number): string {
  if (ops >= 1000000) {
    return `${(ops / 1000000).toFixed(2)}M`
  }
  if (ops >= 1000) {
    return `${(ops / 1000).toFixed(2)}K`
  }
  return ops.toFixed(0)
}

/**
 * Pad string to width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str
  const padding = ' '.repeat(width - str.length)
  return align === 'left' ? str + padding : padding + str
}

/**
 * Create a Bench from the run configuration
 */
export function createBench(config: BenchmarkConfig): Bench {
  return new Bench({
    time: config.time ?? 1000,
    ...(config.iterations !== undefined ? { iterations: config.iterations } : {}),
    ...(config.warmup === false ? { warmupTime: 0, warmupIterations: 0 } : {}),
  })
}

/**
 * Warm up (unless disabled) and run a Bench
 */
export async function runBench(bench: Bench, config: BenchmarkConfig): Promise<Bench> {
  if (config.warmup !== false) {
    await bench.warmup()
  }
  await bench.run()
  return bench
}

/**
 * Step an environment with a fixed action, resetting whenever an episode ends.
 * Keeps the hot loop free of episode bookkeeping in the benchmark body.
 */
export function stepOrReset<S, O extends Observation, I extends EpisodeInfo>(
  env: FunctionalEnv<S, O, I>,
  action: number,
): void {
  const result = env.step(action)
  if (result.terminated || result.truncated) {
    env.reset()
  }
}

/**
 * Standard environment counts for vectorized benchmarks
 */
export const STANDARD_ENV_COUNTS: number[] = [1, 8, 32]
