/**
 * Single-Environment Step Benchmarks
 *
 * Measures the cost of one tick for each built-in game, and splits the
 * runner's tick into simulation and rasterization.
 */

import { DinoRunner, FlappyBird } from '@arcade-gym/envs'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { createBench, runBench, stepOrReset } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Environment Step',
  category: 'envs',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)

    const dino = DinoRunner({ seed: 0 })
    dino.reset()
    const bigDino = DinoRunner({ seed: 0, screenWidth: 168, screenHeight: 168 })
    bigDino.reset()
    const flappy = FlappyBird({ seed: 0 })
    flappy.reset()

    let tick = 0

    // 1. Full step (simulation + observation)
    bench.add('DinoRunner step (84x84)', () => {
      stepOrReset(dino, tick++ % 20 === 0 ? 1 : 0)
    })

    bench.add('DinoRunner step (168x168)', () => {
      stepOrReset(bigDino, tick++ % 20 === 0 ? 1 : 0)
    })

    bench.add('FlappyBird step', () => {
      const [y = 0, , , gapY = 0] = flappy.observe()
      stepOrReset(flappy, y < gapY ? 1 : 0)
    })

    // 2. Observation only
    bench.add('DinoRunner observe (84x84)', () => {
      dino.observe()
    })

    bench.add('FlappyBird observe', () => {
      flappy.observe()
    })

    // 3. Episode start
    bench.add('DinoRunner reset', () => {
      dino.reset()
    })

    bench.add('FlappyBird reset', () => {
      flappy.reset()
    })

    return runBench(bench, config)
  },
}

export default suite
