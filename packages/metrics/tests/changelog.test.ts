import { describe, expect, it } from 'vitest';
import { ParseError, parseTrackerTimestamp } from '@flowpulse/core';
import { statusChange } from '@flowpulse/test-utils';
import { cycleHours, reduceChangelog } from '../src/collectors/changelog.js';
import { ANY_STATE } from '../src/types.js';

const T1 = '2024-01-15T09:00:00.000+0000';
const T2 = '2024-01-16T09:00:00.000+0000';
const T3 = '2024-01-17T09:00:00.000+0000';
const T4 = '2024-01-18T09:00:00.000+0000';

describe('reduceChangelog', () => {
  it('uses the first entry into a start state regardless of input order', () => {
    const events = [statusChange('A', 'Test', T1), statusChange('Test', 'A', T2), statusChange('A', 'Test', T3)];
    const shuffled = [events[2], events[0], events[1]];
    const options = { startStates: ['Test'], endStates: ['Done'] };

    const ordered = reduceChangelog(events, options);
    const fromShuffled = reduceChangelog(shuffled, options);

    expect(ordered.startTime).toEqual(parseTrackerTimestamp(T1));
    expect(fromShuffled).toEqual(ordered);
  });

  it('counts a rework transition back into the start state', () => {
    const result = reduceChangelog(
      [
        statusChange('New', 'InProgress', T1),
        statusChange('InProgress', 'Test', T2),
        statusChange('Test', 'InProgress', T3),
        statusChange('InProgress', 'Done', T4),
      ],
      {
        startStates: ['InProgress'],
        endStates: ['Done'],
        reworkFromStates: ['Test'],
        reworkToState: 'InProgress',
      }
    );

    expect(result.reworkCount).toBe(1);
    expect(result.startTime).toEqual(parseTrackerTimestamp(T1));
    expect(result.endTime).toEqual(parseTrackerTimestamp(T4));
  });

  it('leaves both bounds absent when no start state is reached', () => {
    const result = reduceChangelog([statusChange('New', 'Backlog', T1), statusChange('Backlog', 'Done', T2)], {
      startStates: ['InProgress'],
      endStates: ['Done'],
    });

    expect(result).toEqual({ reworkCount: 0 });
    expect(cycleHours(result)).toBeUndefined();
  });

  it('ignores an end state reached before the start', () => {
    const result = reduceChangelog([statusChange('New', 'Done', T1), statusChange('Done', 'InProgress', T2)], {
      startStates: ['InProgress'],
      endStates: ['Done'],
    });

    expect(result.startTime).toEqual(parseTrackerTimestamp(T2));
    expect(result.endTime).toBeUndefined();
  });

  it('keeps the first end state after start when it is re-entered', () => {
    const result = reduceChangelog(
      [
        statusChange('New', 'InProgress', T1),
        statusChange('InProgress', 'Done', T2),
        statusChange('Done', 'InProgress', T3),
        statusChange('InProgress', 'Done', T4),
      ],
      { startStates: ['InProgress'], endStates: ['Done'] }
    );

    expect(result.endTime).toEqual(parseTrackerTimestamp(T2));
  });

  it('ends on any status change after start with ANY_STATE', () => {
    const result = reduceChangelog(
      [statusChange('Review', 'Test', T1), statusChange('Test', 'Blocked', T3), statusChange('Blocked', 'Done', T4)],
      { startStates: ['Test'], endStates: ANY_STATE }
    );

    expect(result.endTime).toEqual(parseTrackerTimestamp(T3));
  });

  it('only interprets status events', () => {
    const result = reduceChangelog(
      [{ field: 'assignee', from: null, to: 'InProgress', timestamp: T1 }, statusChange('New', 'InProgress', T2)],
      { startStates: ['InProgress'], endStates: ['Done'] }
    );

    expect(result.startTime).toEqual(parseTrackerTimestamp(T2));
  });

  it('counts rework across the whole history, including before start', () => {
    const result = reduceChangelog(
      [statusChange('Test', 'InProgress', T1), statusChange('InProgress', 'Test', T2), statusChange('Test', 'InProgress', T3)],
      { startStates: ['Done'], endStates: ['Closed'], reworkFromStates: ['Test'], reworkToState: ['InProgress'] }
    );

    expect(result).toEqual({ reworkCount: 2 });
  });

  it('throws ParseError for an unparsable timestamp', () => {
    expect(() =>
      reduceChangelog([statusChange('New', 'InProgress', 'not a date')], {
        startStates: ['InProgress'],
        endStates: ['Done'],
      })
    ).toThrow(ParseError);
  });
});

describe('cycleHours', () => {
  it('returns business hours when both bounds exist', () => {
    expect(
      cycleHours({ startTime: parseTrackerTimestamp(T1), endTime: parseTrackerTimestamp(T3), reworkCount: 0 })
    ).toBe(24);
  });
});
