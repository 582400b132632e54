/**
 * Example usage of @arcade-gym/test-utils
 * This file demonstrates all the utilities provided by the package
 */

import { describe, test, expect, beforeAll } from 'vitest';
import { DinoRunner, FlappyBird, discrete } from '@arcade-gym/envs';
import { setupObservationMatchers, rollout, ActionScripts } from '../src/index.js';

// Setup custom matchers
beforeAll(() => {
  setupObservationMatchers();
});

describe('Custom Matchers', () => {
  test('toBeWithinSpace matcher with box spaces', () => {
    const flappy = FlappyBird();
    const { observation } = flappy.reset(0);
    expect(observation).toBeWithinSpace(flappy.observationSpace);
    expect(new Float32Array([2, 0, 0, 0])).not.toBeWithinSpace(flappy.observationSpace);
    expect(new Float32Array([0.5, 0])).not.toBeWithinSpace(flappy.observationSpace);
  });

  test('toBeWithinSpace matcher with discrete spaces', () => {
    expect(1).toBeWithinSpace(discrete(2));
    expect(2).not.toBeWithinSpace(discrete(2));
    expect(0.5).not.toBeWithinSpace(discrete(2));
  });

  test('toEqualObservation matcher', () => {
    const a = DinoRunner().reset(4).observation;
    const b = DinoRunner().reset(4).observation;
    expect(a).toEqualObservation(b);
    expect(new Float32Array([0.5, 0.25])).toEqualObservation([0.5001, 0.25], 1e-3);
    expect(new Float32Array([0.5, 0.25])).not.toEqualObservation([0.5, 0.25, 0]);
  });

  test('toBeFiniteObservation matcher', () => {
    expect(FlappyBird().reset(1).observation).toBeFiniteObservation();
    expect([0, Number.NaN]).not.toBeFiniteObservation();
  });
});

describe('rollout()', () => {
  test('runs until the episode terminates', () => {
    const trace = rollout(FlappyBird(), ActionScripts.idle, { seed: 0 });
    expect(trace.length).toBe(22);
    expect(trace.terminated).toBe(true);
    expect(trace.truncated).toBe(false);
    expect(trace.rewards).toHaveLength(22);
    expect(trace.totalReward).toBeCloseTo(0.22);
    expect(trace.finalInfo).toEqual({ score: 0 });
  });

  test('stops at maxSteps without ending the episode', () => {
    const trace = rollout(DinoRunner(), ActionScripts.idle, { seed: 0, maxSteps: 50 });
    expect(trace.length).toBe(50);
    expect(trace.terminated).toBe(false);
    expect(trace.truncated).toBe(false);
    expect(trace.totalReward).toBe(50);
  });

  test('reports truncation', () => {
    const trace = rollout(DinoRunner({ maxSteps: 10 }), ActionScripts.idle, { seed: 0 });
    expect(trace.length).toBe(10);
    expect(trace.truncated).toBe(true);
    expect(trace.terminated).toBe(false);
  });

  test('records observations including the reset frame', () => {
    const trace = rollout(FlappyBird(), ActionScripts.always, { seed: 0, maxSteps: 3, recordObservations: true });
    expect(trace.observations).toHaveLength(4);
    expect(trace.observations[1]![0]).toBeCloseTo(0.528);
  });
});

describe('ActionScripts', () => {
  test('every(n) fires on multiples of n', () => {
    const trace = rollout(FlappyBird(), ActionScripts.every(3), { seed: 0, maxSteps: 7 });
    expect(trace.actions).toEqual([1, 0, 0, 1, 0, 0, 1]);
  });

  test('sequence() replays then idles', () => {
    const trace = rollout(FlappyBird(), ActionScripts.sequence([1, 1]), { seed: 0, maxSteps: 4 });
    expect(trace.actions).toEqual([1, 1, 0, 0]);
  });

  test('followGap flaps only below the gap while not rising', () => {
    expect(ActionScripts.followGap(new Float32Array([0.4, 0, 0.5, 0.6]))).toBe(1);
    expect(ActionScripts.followGap(new Float32Array([0.4, 0.01, 0.5, 0.6]))).toBe(0);
    expect(ActionScripts.followGap(new Float32Array([0.7, -0.01, 0.5, 0.6]))).toBe(0);
  });
});
