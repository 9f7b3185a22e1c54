/**
 * @flowpulse/metrics - Workflow metric derivation.
 *
 * Reduces issue changelogs into cycle times and rework counts, and builds
 * the per-cycle metric snapshot.
 *
 * Main entry point: runMetricCycle()
 */

export * from './types.js';

export { reduceChangelog, cycleHours } from './collectors/changelog.js';
export { collectDeveloperLoad, collectDeveloperCycle } from './collectors/developer.js';
export { collectQaTesting } from './collectors/qa.js';
export { collectAgingCategory } from './collectors/aging.js';
export { createMetricSet, QA_TESTING_BUCKETS, type MetricSet } from './snapshot.js';
export { inProgressJql, recentlyClosedJql, qaHandoffJql, statusJql } from './queries.js';
export { runMetricCycle } from './engine.js';
