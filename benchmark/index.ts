#!/usr/bin/env -S npx tsx
/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   tsx benchmark/index.ts           # Run all benchmarks
 *   tsx benchmark/index.ts --category envs
 *   tsx benchmark/index.ts --filter vectorized
 *   tsx benchmark/index.ts --json
 */

import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Logger } from '@arcade-gym/core'
import { BenchmarkRunner } from './lib/runner.js'
import type { BenchmarkConfig, OutputConfig } from './lib/types.js'

/**
 * Parse command line arguments
 */
function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2)
  const output: OutputConfig = {
    console: true,
    json: false,
  }
  const config: BenchmarkConfig = {
    time: 1000,
    warmup: true,
    output,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const value = args[i + 1]

    if (arg === '--category' && value) {
      config.category = value
      i++
    } else if (arg === '--filter' && value) {
      config.filter = value
      i++
    } else if (arg === '--json') {
      output.json = true
    } else if (arg === '--time' && value) {
      config.time = parseInt(value, 10)
      i++
    } else if (arg === '--envs' && value) {
      config.envCounts = value.split(',').map((n) => parseInt(n, 10))
      i++
    } else if (arg === '--no-warmup') {
      config.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      printHelp()
      process.exit(0)
    }
  }

  return config
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
arcade-gym Benchmark Suite

Usage:
  tsx benchmark/index.ts [options]

Options:
  --category <name>   Filter by category (envs)
  --filter <pattern>  Filter benchmarks by name pattern
  --json              Output results to JSON file
  --time <ms>         Time per benchmark in ms (default: 1000)
  --envs <list>       Env counts for vectorized suites (default: 1,8,32)
  --no-warmup         Skip warmup phase
  --help, -h          Show this help message

Examples:
  tsx benchmark/index.ts                      # Run all benchmarks
  tsx benchmark/index.ts --filter step        # Single-environment steps only
  tsx benchmark/index.ts --envs 4,16 --json   # Custom batch sizes, save JSON
`)
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = parseArgs()
  const runner = new BenchmarkRunner(config)

  // Discover benchmarks from the benchmark directory
  const benchmarkDir = dirname(fileURLToPath(import.meta.url))
  await runner.discover(benchmarkDir)

  // Run benchmarks
  await runner.run()
}

main().catch((err: unknown) => {
  Logger.error('Benchmark failed:', err)
  process.exit(1)
})
