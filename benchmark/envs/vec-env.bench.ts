/**
 * Vectorized Environment Benchmarks
 *
 * Steps DummyVecEnv batches of increasing size. Ops/sec here is batches per
 * second; multiply by the env count for environment steps per second.
 */

import { DinoRunner, FlappyBird, vecEnv } from '@arcade-gym/envs'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { createBench, runBench, STANDARD_ENV_COUNTS } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Vectorized Environments',
  category: 'envs',

  async run(config: BenchmarkConfig) {
    const bench = createBench(config)
    const envCounts = config.envCounts ?? STANDARD_ENV_COUNTS

    for (const nEnvs of envCounts) {
      const dinoVec = vecEnv({ env: () => DinoRunner(), nEnvs, seed: 0 })
      dinoVec.reset()
      const dinoActions = new Int32Array(nEnvs)

      bench.add(`DummyVecEnv DinoRunner x${nEnvs}`, () => {
        dinoVec.step(dinoActions)
      })

      const flappyVec = vecEnv({ env: () => FlappyBird(), nEnvs, seed: 0 })
      flappyVec.reset()
      const flappyActions = new Int32Array(nEnvs)
      let tick = 0

      bench.add(`DummyVecEnv FlappyBird x${nEnvs}`, () => {
        flappyActions.fill(tick++ % 10 === 0 ? 1 : 0)
        flappyVec.step(flappyActions)
      })
    }

    return runBench(bench, config)
  },
}

export default suite
