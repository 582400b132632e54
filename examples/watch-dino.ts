/**
 * Watch DinoRunner in the terminal
 *
 * Renders each frame as ASCII art using the rgb_array renderer, with a
 * simple controller that jumps when an obstacle is close.
 *
 * Run with: npm run example:watch
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { Gym } from '@arcade-gym/envs'

const FRAME_DELAY_MS = 30
// Terminal cells are about twice as tall as they are wide
const ROW_STRIDE = 2

function toAscii(rgb: Uint8Array, width: number, height: number): string {
  const lines: string[] = []
  for (let row = 0; row < height; row += ROW_STRIDE) {
    let line = ''
    for (let col = 0; col < width; col++) {
      line += (rgb[(row * width + col) * 3] ?? 0) > 0 ? '#' : ' '
    }
    lines.push(line)
  }
  return lines.join('\n')
}

async function main() {
  const env = Gym.envs.DinoRunner({ renderMode: 'rgb_array', maxSteps: 1500 })
  const { screenWidth, screenHeight, dinoX, dinoWidth } = env.getState().config

  env.reset(3)
  let done = false

  while (!done) {
    const state = env.getState()
    const ahead = state.stream.obstacles.find((o) => o.x + o.width >= dinoX)
    const gap = ahead === undefined ? Infinity : ahead.x - (dinoX + dinoWidth)
    const action = gap < 4 + state.speed * 4 ? 1 : 0

    const result = env.step(action)
    done = result.terminated || result.truncated

    const frame = env.render()
    if (frame !== null) {
      process.stdout.write('\x1b[H\x1b[2J')
      process.stdout.write(`${toAscii(frame, screenWidth, screenHeight)}\n`)
      process.stdout.write(`score ${result.info.score}  speed ${result.info.speed.toFixed(2)}  step ${result.info.steps}\n`)
    }

    await sleep(FRAME_DELAY_MS)
  }

  env.close()
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
