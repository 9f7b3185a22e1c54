import { describe, it, expect } from 'vitest';
import { Logger } from '../src/logger.js';
import type { LogEntry } from '../src/logger.js';

describe('Logger', () => {
  it('invokes onLog with structured entries', () => {
    const seen: LogEntry[] = [];
    const logger = new Logger({ console: false, onLog: (entry) => seen.push(entry) });

    logger.warn('collect', 'Skipping record', { issue: 'GRV-1' });

    expect(seen).toHaveLength(1);
    expect(seen[0].level).toBe('warn');
    expect(seen[0].category).toBe('collect');
    expect(seen[0].data).toEqual({ issue: 'GRV-1' });
  });

  it('records category failures with the error type', () => {
    const logger = new Logger({ console: false });

    logger.categoryFailed({ category: 'aging', error: new TypeError('boom'), jql: 'project = GRV' });

    const [entry] = logger.allEntries;
    expect(entry.level).toBe('error');
    expect(entry.message).toBe('Category "aging" failed: boom');
    expect(entry.data).toEqual({ errorType: 'TypeError', jql: 'project = GRV' });
  });

  it('logs a finished cycle with failures at warn level', () => {
    const logger = new Logger({ console: false });

    logger.cycleFinished({
      cycleId: 'abc',
      cycle: 3,
      durationMs: 120,
      failedCategories: ['qa_testing'],
      alertsSent: 1,
      published: true,
    });

    const [entry] = logger.allEntries;
    expect(entry.level).toBe('warn');
    expect(entry.message).toBe('Cycle 3 finished');
    expect(entry.data).toEqual({
      cycleId: 'abc',
      durationMs: 120,
      alertsSent: 1,
      published: true,
      failedCategories: ['qa_testing'],
    });
  });
});
