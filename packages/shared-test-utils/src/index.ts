/**
 * @arcade-gym/test-utils
 *
 * Shared test utilities for the arcade-gym monorepo
 */

// Matchers
export {
  setupObservationMatchers,
  observationMatchers,
} from './matchers/observation-matchers.js';

// Helpers
export {
  rollout,
  type ActionPolicy,
  type RolloutOptions,
  type RolloutTrace,
} from './helpers/rollout.js';

// Fixtures
export { ActionScripts } from './fixtures/action-scripts.js';
