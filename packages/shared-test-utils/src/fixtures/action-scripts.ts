/**
 * Scripted action policies for driving environments in tests
 */

import type { Observation } from '@arcade-gym/envs';
import type { ActionPolicy } from '../helpers/rollout.js';

export const ActionScripts = {
  /** Never jump or flap */
  idle: (): number => 0,

  /** Jump or flap on every step */
  always: (): number => 1,

  /** 1 on steps 0, n, 2n, ... */
  every(n: number): ActionPolicy<Observation> {
    return (_observation, step) => (step % n === 0 ? 1 : 0);
  },

  /** Replay a fixed sequence, then fall back to 0 */
  sequence(actions: readonly number[]): ActionPolicy<Observation> {
    return (_observation, step) => actions[step] ?? 0;
  },

  /**
   * Flyer heuristic: flap while the bird is below the gap centre and not
   * already rising
   */
  followGap(observation: Observation): number {
    const [y = 0, vy = 0, , gapY = 0] = observation;
    return y < gapY && vy <= 0 ? 1 : 0;
  },
};
