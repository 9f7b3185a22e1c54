/**
 * Changelog reducer.
 *
 * Walks an issue's status history and extracts the first entry into a
 * start state, the first entry into an end state after that, and the
 * number of rework transitions. Input order is not trusted: events are
 * sorted chronologically (stable for equal instants) before use.
 */

import {
  businessDuration,
  parseTrackerTimestamp,
  type ChangeEvent,
  type TrackerTimestamp,
} from '@flowpulse/core';
import { ANY_STATE, type ReduceOptions, type ReduceResult, type StateMatcher } from '../types.js';

interface TimedEvent {
  event: ChangeEvent;
  at: TrackerTimestamp;
}

/**
 * Reduce a changelog. Throws ParseError when a status event carries an
 * unparsable timestamp; callers skip the whole record in that case.
 */
export function reduceChangelog(
  events: readonly ChangeEvent[],
  options: ReduceOptions
): ReduceResult {
  const startStates = new Set(options.startStates);
  const reworkFrom = new Set(options.reworkFromStates ?? []);
  const reworkTo = new Set(
    typeof options.reworkToState === 'string'
      ? [options.reworkToState]
      : options.reworkToState ?? []
  );

  const ordered: TimedEvent[] = events
    .filter((event) => event.field === 'status')
    .map((event) => ({ event, at: parseTrackerTimestamp(event.timestamp) }))
    .sort((a, b) => a.at.epochMs - b.at.epochMs);

  let startTime: TrackerTimestamp | undefined;
  let endTime: TrackerTimestamp | undefined;
  let reworkCount = 0;

  for (const { event, at } of ordered) {
    if (event.from !== null && reworkFrom.has(event.from) && event.to !== null && reworkTo.has(event.to)) {
      reworkCount++;
    }

    if (!startTime) {
      if (event.to !== null && startStates.has(event.to)) startTime = at;
      continue;
    }

    if (!endTime && entersState(event, options.endStates)) {
      endTime = at;
    }
  }

  return {
    ...(startTime ? { startTime } : {}),
    ...(endTime ? { endTime } : {}),
    reworkCount,
  };
}

function entersState(event: ChangeEvent, matcher: StateMatcher): boolean {
  if (matcher === ANY_STATE) return true;
  return event.to !== null && matcher.includes(event.to);
}

/** Business hours between start and end, or undefined unless both exist */
export function cycleHours(result: ReduceResult): number | undefined {
  if (!result.startTime || !result.endTime) return undefined;
  return businessDuration(result.startTime, result.endTime);
}
