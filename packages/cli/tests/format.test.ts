import { describe, expect, it } from 'vitest';
import { createTeamDirectory } from '@flowpulse/test-utils';
import { formatSample, formatSamples, teamToJson } from '../src/format.js';

describe('formatSample', () => {
  it('renders labels in exposition style', () => {
    expect(formatSample({ name: 'dev_rework_total', labels: { developer: 'Ana' }, value: 2 })).toBe(
      'dev_rework_total{developer="Ana"} 2'
    );
  });

  it('omits braces without labels and escapes quotes', () => {
    expect(formatSample({ name: 'flowpulse_cycle_failed_categories', labels: {}, value: 0 })).toBe(
      'flowpulse_cycle_failed_categories 0'
    );
    expect(formatSample({ name: 'x', labels: { developer: 'Ana "A"' }, value: 1 })).toBe(
      'x{developer="Ana \\"A\\""} 1'
    );
  });
});

describe('formatSamples', () => {
  it('sorts by metric name and indents', () => {
    expect(
      formatSamples([
        { name: 'qa_testing_time_days_count', labels: {}, value: 1 },
        { name: 'aging_tickets_count', labels: { category: 'paused' }, value: 3 },
      ])
    ).toBe('  aging_tickets_count{category="paused"} 3\n  qa_testing_time_days_count 1');
  });
});

describe('teamToJson', () => {
  it('converts maps to plain objects', () => {
    const team = createTeamDirectory({ developers: { 'acc-2': 'Bo' }, qa: { 'acc-1': 'Al' } });
    expect(teamToJson(team)).toEqual({
      developers: { 'acc-2': 'Bo' },
      qa: { 'acc-1': 'Al' },
      pm: {},
      internalIds: ['acc-1', 'acc-2'],
    });
  });
});
