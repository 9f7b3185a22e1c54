/**
 * Types for the metric cycle engine.
 */

import type {
  Clock,
  Logger,
  TeamDirectory,
  TrackerClient,
  TrackerTimestamp,
  WorkflowConfig,
} from '@flowpulse/core';
import type { MetricsSnapshot } from '@flowpulse/integrations';

// ─── Changelog Reduction ───────────────────────────────────────────

/** Matches any to-state: "the first status change after start" */
export const ANY_STATE: unique symbol = Symbol('ANY_STATE');

export type StateMatcher = readonly string[] | typeof ANY_STATE;

export interface ReduceOptions {
  /** Entering any of these states starts the clock */
  startStates: readonly string[];
  /** Entering any of these states (after start) stops it */
  endStates: StateMatcher;
  /** Rework transitions leave one of these states... */
  reworkFromStates?: readonly string[];
  /** ...and enter this one (or one of these) */
  reworkToState?: string | readonly string[];
}

export interface ReduceResult {
  startTime?: TrackerTimestamp;
  endTime?: TrackerTimestamp;
  reworkCount: number;
}

// ─── Cycle Engine ──────────────────────────────────────────────────

/** Everything a collector needs for one pass */
export interface MetricContext {
  tracker: TrackerClient;
  team: TeamDirectory;
  workflow: WorkflowConfig;
  projectKey: string;
  clock: Clock;
  logger: Logger;
}

export interface MetricCycleResult {
  snapshot: MetricsSnapshot;
  /** Categories whose queries failed; their metrics are missing from the snapshot */
  failedCategories: string[];
}
