import { describe, expect, it } from 'vitest';
import { Logger } from '@flowpulse/core';
import { MockTracker } from '@flowpulse/test-utils';
import { buildAccountMap, buildTeamDirectory, normalizeName } from '../src/jira/users.js';

describe('buildAccountMap', () => {
  it('resolves names and omits unmatched ones', async () => {
    const logger = new Logger({ console: false });
    const tracker = new MockTracker().addUsers({ accountId: 'acc-1', displayName: 'Ana Diaz' });

    const map = await buildAccountMap(tracker, ['Ana Diaz', 'Ghost'], 'developers', logger);

    expect([...map]).toEqual([['acc-1', 'Ana Diaz']]);
    expect(logger.allEntries.some((e) => e.message === 'No account found for "Ghost"')).toBe(true);
  });

  it('logs and continues when a lookup throws', async () => {
    const logger = new Logger({ console: false });
    const tracker = new MockTracker().addUsers({ accountId: 'acc-2', displayName: 'Bruno' });
    tracker.findUser.mockRejectedValueOnce(new Error('timeout'));

    const map = await buildAccountMap(tracker, ['Ana', 'Bruno'], 'qa', logger);

    expect([...map.keys()]).toEqual(['acc-2']);
    const failure = logger.allEntries.find((e) => e.level === 'error');
    expect(failure?.message).toBe('Lookup failed for "Ana": timeout');
  });
});

describe('buildTeamDirectory', () => {
  it('derives internal ids and names from every group', async () => {
    const tracker = new MockTracker().addUsers(
      { accountId: 'acc-dev', displayName: 'Dev One' },
      { accountId: 'acc-qa', displayName: 'QA One' },
      { accountId: 'acc-pm', displayName: 'PM One' }
    );

    const team = await buildTeamDirectory(
      tracker,
      {
        developerNames: ['Dev One'],
        qaNames: ['QA One'],
        pmNames: ['PM One'],
        internalUsers: ['acc-support'],
      },
      new Logger({ console: false })
    );

    expect(team.developers.get('acc-dev')).toBe('Dev One');
    expect(team.qa.get('acc-qa')).toBe('QA One');
    expect(team.pm.get('acc-pm')).toBe('PM One');
    expect([...team.internalIds].sort()).toEqual(['acc-dev', 'acc-pm', 'acc-qa', 'acc-support']);
    expect(team.internalNames.has('dev one')).toBe(true);
    expect(team.internalNames.has('acc-support')).toBe(true);
  });
});

describe('normalizeName', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeName('  Ana   DIAZ ')).toBe('ana diaz');
  });
});
