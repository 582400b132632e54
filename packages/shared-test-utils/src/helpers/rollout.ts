import type { EpisodeInfo, FunctionalEnv, Observation } from '@arcade-gym/envs';

/**
 * Chooses the next action from the latest observation and the step index
 */
export type ActionPolicy<O extends Observation> = (observation: O, step: number) => number;

export interface RolloutOptions {
  /** Seed passed to reset() */
  seed?: number;
  /** Stop after this many steps even if the episode is still running (default: 10000) */
  maxSteps?: number;
  /** Keep every observation in the trace (default: false) */
  recordObservations?: boolean;
}

export interface RolloutTrace<O extends Observation, I extends EpisodeInfo> {
  actions: number[];
  rewards: number[];
  totalReward: number;
  length: number;
  terminated: boolean;
  truncated: boolean;
  finalInfo: I;
  observations: O[];
}

/**
 * Run one episode from reset() until it terminates, truncates or hits maxSteps
 *
 * @example
 * ```ts
 * const trace = rollout(FlappyBird(), ActionScripts.idle, { seed: 0 });
 * expect(trace.length).toBe(22);
 * ```
 */
export function rollout<S, O extends Observation, I extends EpisodeInfo>(
  env: FunctionalEnv<S, O, I>,
  policy: ActionPolicy<O>,
  options: RolloutOptions = {},
): RolloutTrace<O, I> {
  const { seed, maxSteps = 10000, recordObservations = false } = options;
  const reset = env.reset(seed);

  let observation = reset.observation;
  const trace: RolloutTrace<O, I> = {
    actions: [],
    rewards: [],
    totalReward: 0,
    length: 0,
    terminated: false,
    truncated: false,
    finalInfo: reset.info,
    observations: recordObservations ? [observation] : [],
  };

  while (trace.length < maxSteps) {
    const action = policy(observation, trace.length);
    const result = env.step(action);

    observation = result.observation;
    trace.actions.push(action);
    trace.rewards.push(result.reward);
    trace.totalReward += result.reward;
    trace.length++;
    trace.finalInfo = result.info;
    if (recordObservations) trace.observations.push(observation);

    if (result.terminated || result.truncated) {
      trace.terminated = result.terminated;
      trace.truncated = result.truncated;
      break;
    }
  }

  return trace;
}
