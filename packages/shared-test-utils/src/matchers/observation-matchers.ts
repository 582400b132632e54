import { expect } from 'vitest';
import type { Space } from '@arcade-gym/envs';

/**
 * Custom Vitest matchers for observation and space assertions
 */

interface ObservationMatchers<R = unknown> {
  /**
   * Assert that a value lies inside a space
   * (an integer action for discrete spaces, a flat buffer for box spaces)
   */
  toBeWithinSpace(space: Space): R;

  /**
   * Assert that two observation buffers have equal length and values
   */
  toEqualObservation(expected: ArrayLike<number>, tolerance?: number): R;

  /**
   * Assert that every value of an observation is finite
   */
  toBeFiniteObservation(): R;
}

declare module 'vitest' {
  interface Assertion<T = any> extends ObservationMatchers<T> {}
  interface AsymmetricMatchersContaining extends ObservationMatchers {}
}

function isArrayLike(value: unknown): value is ArrayLike<number> {
  return ArrayBuffer.isView(value) || Array.isArray(value);
}

function toNumberArray(arr: ArrayLike<number>): number[] {
  return Array.from(arr, (val) => Number(val));
}

function preview(values: readonly number[]): string {
  if (values.length <= 8) return `[${values.join(', ')}]`;
  return `[${values.slice(0, 8).join(', ')}, ... (${values.length} values)]`;
}

export const observationMatchers = {
  toBeWithinSpace(received: unknown, space: Space) {
    if (space.type === 'discrete') {
      const pass = typeof received === 'number' && space.contains(received);
      return {
        pass,
        message: () =>
          pass
            ? `Expected ${String(received)} not to be an action of discrete(${space.n})`
            : `Expected an integer action in [0, ${space.n}), but got ${String(received)}`,
        actual: received,
      };
    }

    if (!isArrayLike(received)) {
      return {
        pass: false,
        message: () => `Expected an observation buffer, but got ${typeof received}`,
        actual: received,
      };
    }

    const pass = space.contains(received);
    const values = toNumberArray(received);
    const outside = values.findIndex(
      (val, idx) => !(val >= (space.low[idx] ?? 0) && val <= (space.high[idx] ?? 0)),
    );

    return {
      pass,
      message: () => {
        if (pass) return `Expected observation not to lie within box [${space.shape.join(', ')}], but it does`;
        if (values.length !== space.low.length) {
          return `Expected ${space.low.length} values for box [${space.shape.join(', ')}], but got ${values.length}`;
        }
        return `Expected observation within bounds, but index ${outside} is ${values[outside]} (bounds [${space.low[outside]}, ${space.high[outside]}])`;
      },
      actual: values.length,
      expected: space.low.length,
    };
  },

  toEqualObservation(received: ArrayLike<number>, expected: ArrayLike<number>, tolerance: number = 1e-6) {
    const actual = toNumberArray(received);
    const expectedValues = toNumberArray(expected);

    if (actual.length !== expectedValues.length) {
      return {
        pass: false,
        message: () => `Expected observations to have equal lengths, but got ${actual.length} and ${expectedValues.length}`,
        actual: actual.length,
        expected: expectedValues.length,
      };
    }

    const mismatch = actual.findIndex((val, idx) => Math.abs(val - (expectedValues[idx] ?? Number.NaN)) > tolerance);
    const pass = mismatch === -1;

    return {
      pass,
      message: () =>
        pass
          ? `Expected observations not to be equal, but they are`
          : `Expected observation values to be close within tolerance ${tolerance}, first difference at index ${mismatch}:\nActual:   ${preview(actual)}\nExpected: ${preview(expectedValues)}`,
      actual,
      expected: expectedValues,
    };
  },

  toBeFiniteObservation(received: ArrayLike<number>) {
    const values = toNumberArray(received);
    const nonFiniteValues = values.filter((val) => !Number.isFinite(val));
    const pass = nonFiniteValues.length === 0;

    return {
      pass,
      message: () =>
        pass
          ? `Expected observation to contain non-finite values, but all values are finite`
          : `Expected all observation values to be finite, but found: [${nonFiniteValues.join(', ')}]`,
      actual: values,
    };
  },
};

/**
 * Setup observation matchers for Vitest
 * Call this in your test setup file or at the beginning of test suites
 */
export function setupObservationMatchers(): void {
  expect.extend(observationMatchers);
}
