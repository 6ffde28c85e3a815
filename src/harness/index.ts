/**
 * Harness module exports
 */

export { runFixture, runFixtures, findFixtures, FixtureReadError } from './fixtures.js';
export type { FixtureOptions, FixtureResult } from './fixtures.js';
