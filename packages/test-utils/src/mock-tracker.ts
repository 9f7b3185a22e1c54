/**
 * Mock implementation of the TrackerClient interface for testing.
 *
 * Every method is a vitest spy (vi.fn). Searches and counts are routed by
 * matching the JQL against registered patterns, so a test can describe
 * which issues each query returns without caring about clause order.
 *
 * @example
 * ```ts
 * const tracker = new MockTracker();
 * tracker.onSearch('status changed to "Listo para Prod"', [issue]);
 * tracker.onCount('status = "EN CURSO"', 2);
 * tracker.failOn('status = "Pausado"', new Error('boom'));
 * ```
 */
import { vi } from 'vitest';
import type { Mock } from 'vitest';

import type {
  AlertSink,
  Issue,
  IssueComment,
  SearchOptions,
  TrackerClient,
  TrackerUser,
} from '@flowpulse/core';

type JqlPattern = string | RegExp;

interface Route<T> {
  pattern: JqlPattern;
  result: T;
}

function matches(pattern: JqlPattern, jql: string): boolean {
  return typeof pattern === 'string' ? jql.includes(pattern) : pattern.test(jql);
}

export class MockTracker implements TrackerClient {
  private searchRoutes: Route<Issue[]>[] = [];
  private countRoutes: Route<number>[] = [];
  private failures: Route<Error>[] = [];
  private users: TrackerUser[] = [];
  private comments = new Map<string, IssueComment | null>();

  /** The account returned by checkConnection */
  self: TrackerUser = { accountId: 'acc-bot', displayName: 'Metrics Bot' };

  // ── TrackerClient ───────────────────────────────────────────────────────────

  checkConnection: Mock<() => Promise<TrackerUser>> = vi.fn(async () => this.self);

  searchIssues: Mock<(jql: string, options?: SearchOptions) => Promise<Issue[]>> = vi.fn(
    async (jql: string, options?: SearchOptions) => {
      this.throwIfFailing(jql);
      const route = this.searchRoutes.find((r) => matches(r.pattern, jql));
      const issues = route?.result ?? [];
      return options?.maxResults === undefined ? issues : issues.slice(0, options.maxResults);
    }
  );

  countIssues: Mock<(jql: string) => Promise<number>> = vi.fn(async (jql: string) => {
    this.throwIfFailing(jql);
    return this.countRoutes.find((r) => matches(r.pattern, jql))?.result ?? 0;
  });

  findUser: Mock<(query: string) => Promise<TrackerUser | null>> = vi.fn(
    async (query: string) => {
      const q = query.toLowerCase();
      return (
        this.users.find(
          (u) => u.accountId === query || u.displayName.toLowerCase().includes(q)
        ) ?? null
      );
    }
  );

  getLatestComment: Mock<(issueKey: string) => Promise<IssueComment | null>> = vi.fn(
    async (issueKey: string) => this.comments.get(issueKey) ?? null
  );

  // ── Test Setup ──────────────────────────────────────────────────────────────

  /** Return `issues` for searches whose JQL matches the pattern */
  onSearch(pattern: JqlPattern, issues: Issue[]): this {
    this.searchRoutes.push({ pattern, result: issues });
    return this;
  }

  /** Return `count` for counts whose JQL matches the pattern */
  onCount(pattern: JqlPattern, count: number): this {
    this.countRoutes.push({ pattern, result: count });
    return this;
  }

  /** Throw `error` from any search or count whose JQL matches the pattern */
  failOn(pattern: JqlPattern, error: Error): this {
    this.failures.push({ pattern, result: error });
    return this;
  }

  /** Make accounts discoverable through findUser */
  addUsers(...users: TrackerUser[]): this {
    this.users.push(...users);
    return this;
  }

  /** Set (or clear with null) the latest comment of an issue */
  setLatestComment(issueKey: string, comment: IssueComment | null): this {
    this.comments.set(issueKey, comment);
    return this;
  }

  /** All JQL strings passed to searchIssues and countIssues so far */
  get queries(): string[] {
    return [
      ...this.searchIssues.mock.calls.map(([jql]) => jql),
      ...this.countIssues.mock.calls.map(([jql]) => jql),
    ];
  }

  // ── Test Utilities ──────────────────────────────────────────────────────────

  /** Clear routes, fixtures and recorded calls. Call in afterEach. */
  reset(): void {
    this.searchRoutes = [];
    this.countRoutes = [];
    this.failures = [];
    this.users = [];
    this.comments.clear();
    this.checkConnection.mockClear();
    this.searchIssues.mockClear();
    this.countIssues.mockClear();
    this.findUser.mockClear();
    this.getLatestComment.mockClear();
  }

  private throwIfFailing(jql: string): void {
    const failure = this.failures.find((f) => matches(f.pattern, jql));
    if (failure) throw failure.result;
  }
}

/**
 * Alert sink that records every message it is given.
 * Set `failWith` to make sends reject.
 */
export class RecordingAlertSink implements AlertSink {
  readonly name = 'recording';
  failWith: Error | null = null;

  send: Mock<(message: string) => Promise<void>> = vi.fn(async (_message: string) => {
    if (this.failWith) throw this.failWith;
  });

  get messages(): string[] {
    return this.send.mock.calls.map(([message]) => message);
  }
}
