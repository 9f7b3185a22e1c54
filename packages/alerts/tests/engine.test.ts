import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, ParseError, TransportError, getDefaultWorkflowConfig } from '@flowpulse/core';
import { WebhookAlertSink } from '@flowpulse/integrations';
import {
  MockTracker,
  RecordingAlertSink,
  createComment,
  createIssue,
  createTeamDirectory,
} from '@flowpulse/test-utils';
import { AlertDedupState } from '../src/dedup.js';
import { criticalCreatedJql, criticalUpdatedJql, runAlertCycle, type AlertContext } from '../src/engine.js';

const CREATED = 'created >= "-5m"';
const UPDATED = 'updated >= "-5m"';

describe('runAlertCycle', () => {
  let tracker: MockTracker;
  let sink: RecordingAlertSink;
  let logger: Logger;
  let ctx: AlertContext;

  beforeEach(() => {
    tracker = new MockTracker();
    sink = new RecordingAlertSink();
    logger = new Logger({ console: false });
    ctx = {
      tracker,
      sink,
      team: createTeamDirectory({ developers: { 'acc-dev': 'Dev' }, pm: { 'acc-pm': 'PM' } }),
      dedup: new AlertDedupState(),
      workflow: getDefaultWorkflowConfig(),
      projectKey: 'GRV',
      server: 'https://tracker.test',
      cycle: 1,
      dedupMaxIdleCycles: 0,
      logger,
    };
  });

  it('builds the window queries from the workflow configuration', () => {
    expect(criticalCreatedJql('GRV', ctx.workflow)).toBe(
      'project = "GRV" AND priority in ("Highest", "High") AND created >= "-5m"'
    );
    expect(criticalUpdatedJql('GRV', ctx.workflow)).toBe(
      'project = "GRV" AND priority in ("Highest", "High") AND updated >= "-5m"'
    );
  });

  it('sends one message per new critical ticket', async () => {
    tracker.onSearch(CREATED, [createIssue({ key: 'GRV-1' }), createIssue({ key: 'GRV-2' })]);

    const result = await runAlertCycle(ctx);

    expect(result).toEqual({ sent: 2, suppressed: 0, deliveryFailures: 0, failedCategories: [] });
    expect(sink.messages[0]).toContain('<https://tracker.test/browse/GRV-1|GRV-1>');
    expect(sink.messages[1]).toContain('<https://tracker.test/browse/GRV-2|GRV-2>');
  });

  it('alerts once per external comment and again for a newer one', async () => {
    const issue = createIssue({ key: 'T1', priority: 'High' });
    tracker.onSearch(UPDATED, [issue]).setLatestComment('T1', createComment({ issueKey: 'T1', id: 'C1' }));

    await runAlertCycle(ctx);
    const repeat = await runAlertCycle({ ...ctx, cycle: 2 });

    expect(sink.send).toHaveBeenCalledTimes(1);
    expect(repeat.suppressed).toBe(1);

    tracker.setLatestComment('T1', createComment({ issueKey: 'T1', id: 'C2' }));
    await runAlertCycle({ ...ctx, cycle: 3 });

    expect(sink.send).toHaveBeenCalledTimes(2);
    expect(ctx.dedup.lastAlerted('T1')).toBe('C2');
  });

  it('suppresses comments from internal authors', async () => {
    tracker
      .onSearch(UPDATED, [createIssue({ key: 'T1' })])
      .setLatestComment('T1', createComment({ issueKey: 'T1', authorId: 'acc-pm', authorName: 'PM' }));

    const result = await runAlertCycle(ctx);

    expect(result.sent).toBe(0);
    expect(result.suppressed).toBe(1);
    expect(ctx.dedup.size).toBe(0);
  });

  it('does nothing for tickets without comments', async () => {
    tracker.onSearch(UPDATED, [createIssue({ key: 'T1' })]);

    const result = await runAlertCycle(ctx);

    expect(result).toEqual({ sent: 0, suppressed: 0, deliveryFailures: 0, failedCategories: [] });
  });

  it('records the comment even when delivery fails', async () => {
    sink.failWith = new TransportError('Webhook returned 500', 'webhook', 500);
    tracker.onSearch(UPDATED, [createIssue({ key: 'T1' })]).setLatestComment('T1', createComment({ id: 'C1' }));

    const result = await runAlertCycle(ctx);

    expect(result.deliveryFailures).toBe(1);
    expect(result.sent).toBe(0);
    expect(ctx.dedup.lastAlerted('T1')).toBe('C1');
    const entry = logger.allEntries.find((e) => e.level === 'error');
    expect(entry?.message).toBe('Alert for T1 not delivered: Webhook returned 500');
  });

  it('skips a ticket whose comments cannot be read and alerts on the rest', async () => {
    tracker
      .onSearch(UPDATED, [createIssue({ key: 'T1' }), createIssue({ key: 'T2' })])
      .setLatestComment('T2', createComment({ issueKey: 'T2', id: 'C9' }));
    tracker.getLatestComment.mockRejectedValueOnce(new ParseError('Unexpected Jira response'));

    const result = await runAlertCycle(ctx);

    expect(result).toEqual({ sent: 1, suppressed: 0, deliveryFailures: 0, failedCategories: [] });
    expect(sink.messages).toHaveLength(1);
    expect(sink.messages[0]).toContain('<https://tracker.test/browse/T2|T2>');
    expect(ctx.dedup.lastAlerted('T2')).toBe('C9');
    const warning = logger.allEntries.find((e) => e.level === 'warn');
    expect(warning?.message).toBe('Skipping comments of T1: Unexpected Jira response');
  });

  it('keeps evaluating comments when the critical-ticket query fails', async () => {
    tracker
      .failOn(CREATED, new Error('timeout'))
      .onSearch(UPDATED, [createIssue({ key: 'T1' })])
      .setLatestComment('T1', createComment({ id: 'C1' }));

    const result = await runAlertCycle(ctx);

    expect(result.failedCategories).toEqual(['critical_tickets']);
    expect(result.sent).toBe(1);
  });
});

describe('runAlertCycle over a webhook', () => {
  const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
    fetchMock.mockImplementation(async () => new Response('ok', { status: 200 }));
  });

  afterEach(() => {
    fetchMock.mockReset();
    vi.unstubAllGlobals();
  });

  it('posts exactly once for an external comment, and not again on an identical cycle', async () => {
    const logger = new Logger({ console: false });
    const tracker = new MockTracker()
      .onSearch(UPDATED, [createIssue({ key: 'GRV-77', priority: 'Highest' })])
      .setLatestComment('GRV-77', createComment({ issueKey: 'GRV-77', id: '9001', authorName: 'Client' }));
    const ctx: AlertContext = {
      tracker,
      sink: new WebhookAlertSink({ url: 'https://chat.test/hook', logger }),
      team: createTeamDirectory({ developers: { 'acc-dev': 'Dev' } }),
      dedup: new AlertDedupState(),
      workflow: getDefaultWorkflowConfig(),
      projectKey: 'GRV',
      server: 'https://tracker.test',
      cycle: 1,
      dedupMaxIdleCycles: 0,
      logger,
    };

    await runAlertCycle(ctx);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const body = fetchMock.mock.calls[0][1]?.body;
    expect(typeof body === 'string' && JSON.parse(body).text).toContain('GRV-77');

    await runAlertCycle({ ...ctx, cycle: 2 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
