/**
 * FlappyBird Heuristic Example
 *
 * Flies FlappyBird with a hand-written controller that flaps whenever the
 * bird is below the gap centre and not already rising, and compares it
 * with a policy that never flaps.
 *
 * Run with: npm run example:flappy
 */

import { Gym, type FunctionalEnv, type FlappyInfo, type FlappyState } from '@arcade-gym/envs'

type Policy = (observation: Float32Array) => number

const followGap: Policy = (observation) => {
  const [y = 0, vy = 0, , gapY = 0] = observation
  return y < gapY && vy <= 0 ? 1 : 0
}

const idle: Policy = () => 0

function evaluate(
  env: FunctionalEnv<FlappyState, Float32Array, FlappyInfo>,
  policy: Policy,
  episodes: number,
): { meanLength: number; meanScore: number; bestScore: number } {
  let totalLength = 0
  let totalScore = 0
  let bestScore = 0

  for (let ep = 0; ep < episodes; ep++) {
    let { observation } = env.reset(ep)
    let done = false
    let score = 0

    while (!done) {
      const result = env.step(policy(observation))
      observation = result.observation
      score = result.info.score
      done = result.terminated || result.truncated
    }

    totalLength += env.stepCount
    totalScore += score
    bestScore = Math.max(bestScore, score)
  }

  return { meanLength: totalLength / episodes, meanScore: totalScore / episodes, bestScore }
}

function main() {
  console.log('=== FlappyBird Heuristic ===\n')

  // Cap episodes so a perfect controller still finishes
  const env = Gym.envs.FlappyBird({ maxSteps: 5000 })
  const episodes = 20

  for (const [name, policy] of [
    ['idle', idle],
    ['follow-gap', followGap],
  ] as const) {
    const stats = evaluate(env, policy, episodes)
    console.log(`${name}:`)
    console.log(`  mean length: ${stats.meanLength.toFixed(1)} steps`)
    console.log(`  mean score:  ${stats.meanScore.toFixed(2)} pipes`)
    console.log(`  best score:  ${stats.bestScore}\n`)
  }
}

main()
