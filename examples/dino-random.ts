/**
 * DinoRunner Random Agent Example
 *
 * Plays DinoRunner with a random policy across a vectorized batch and
 * reports episode statistics. Useful as a baseline: a random agent jumps
 * about half the time and rarely clears more than a handful of obstacles.
 *
 * Run with: npm run example:dino
 */

import { Logger, createRandomManager } from '@arcade-gym/core'
import { Gym } from '@arcade-gym/envs'

function main() {
  console.log('=== DinoRunner Random Agent ===\n')

  Logger.setLevel('info')

  const nEnvs = 8
  const vecEnv = Gym.vecEnv({
    env: () => Gym.envs.DinoRunner({ maxSteps: 2000 }),
    nEnvs,
    seed: 0,
  })
  console.log(`Environment: DinoRunner (${nEnvs} instances)`)
  console.log(`Observation space: [${vecEnv.observationSpace.shape.join(', ')}] uint8`)
  console.log(`Action space: ${vecEnv.actionSpace.n} (noop, jump)\n`)

  const policy = createRandomManager(1234)
  const actions = new Int32Array(nEnvs)
  const episodes: { length: number; reward: number; score: number }[] = []

  vecEnv.reset()
  const t0 = Date.now()
  let totalSteps = 0

  while (episodes.length < 50) {
    for (let i = 0; i < nEnvs; i++) {
      actions[i] = vecEnv.actionSpace.sample(policy.random)
    }

    const { dones, infos } = vecEnv.step(actions)
    totalSteps += nEnvs

    dones.forEach((done, i) => {
      const info = infos[i]
      if (done !== 1 || info === undefined) return
      episodes.push({
        length: info.episodeLength ?? 0,
        reward: info.episodeReward ?? 0,
        score: info.episodeScore ?? 0,
      })
    })
  }

  const elapsed = (Date.now() - t0) / 1000
  const mean = (values: number[]) => values.reduce((a, b) => a + b, 0) / values.length

  console.log(`Episodes: ${episodes.length}`)
  console.log(`Mean length: ${mean(episodes.map((e) => e.length)).toFixed(1)} steps`)
  console.log(`Mean reward: ${mean(episodes.map((e) => e.reward)).toFixed(1)}`)
  console.log(`Mean score: ${mean(episodes.map((e) => e.score)).toFixed(2)} obstacles`)
  console.log(`Best score: ${Math.max(...episodes.map((e) => e.score))}`)
  console.log(`\nThroughput: ${Math.round(totalSteps / elapsed).toLocaleString()} steps/sec`)

  vecEnv.close()
}

main()
