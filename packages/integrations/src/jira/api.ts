/**
 * Jira Cloud REST API v3 client.
 * Implements the TrackerClient port: JQL search with changelog expansion,
 * approximate counts, user lookup and latest-comment retrieval.
 * Uses the standard fetch API with Basic (e-mail + API token) authentication.
 */

import { z } from 'zod';
import {
  ConnectionError,
  ParseError,
  getLogger,
  type ChangeEvent,
  type Issue,
  type IssueComment,
  type Logger,
  type SearchOptions,
  type TrackerClient,
  type TrackerUser,
} from '@flowpulse/core';

// ─── Types ────────────────────────────────────────────────────────

/** Options for creating a Jira API client */
export interface JiraClientOptions {
  /** Site URL, e.g. https://acme.atlassian.net */
  server: string;
  /** Account e-mail used for Basic auth */
  user: string;
  /** API token for the account */
  apiToken: string;
  logger?: Logger;
}

/** Fields requested on every search */
const ISSUE_FIELDS = [
  'summary',
  'status',
  'assignee',
  'reporter',
  'priority',
  'created',
  'updated',
  'components',
];

/** Page size ceiling accepted by /search/jql */
const MAX_PAGE_SIZE = 100;

const DEFAULT_MAX_RESULTS = 100;

// ─── Raw API Response Schemas ────────────────────────────────────

const rawUserSchema = z.object({
  accountId: z.string(),
  displayName: z.string().nullish(),
});

const rawHistorySchema = z.object({
  created: z.string(),
  author: z.object({ accountId: z.string().optional() }).nullish(),
  items: z.array(
    z.object({
      field: z.string(),
      fromString: z.string().nullish(),
      toString: z.string().nullish(),
    })
  ),
});

const rawIssueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().nullish(),
    status: z.object({ name: z.string() }),
    assignee: rawUserSchema.nullish(),
    reporter: z.object({ displayName: z.string().nullish() }).nullish(),
    priority: z.object({ name: z.string() }).nullish(),
    created: z.string(),
    updated: z.string(),
    components: z.array(z.object({ name: z.string() })).nullish(),
  }),
  changelog: z.object({ histories: z.array(rawHistorySchema) }).nullish(),
});

const searchPageSchema = z.object({
  issues: z.array(z.unknown()),
  nextPageToken: z.string().nullish(),
  isLast: z.boolean().optional(),
});

const countSchema = z.object({ count: z.number().int().min(0) });

const commentPageSchema = z.object({
  comments: z.array(
    z.object({
      id: z.string(),
      created: z.string(),
      author: rawUserSchema.nullish(),
    })
  ),
});

// ─── Client ──────────────────────────────────────────────────────

export class JiraClient implements TrackerClient {
  readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly logger: Logger;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.server.replace(/\/+$/, '');
    this.authHeader =
      'Basic ' + Buffer.from(`${options.user}:${options.apiToken}`).toString('base64');
    this.logger = options.logger ?? getLogger();
  }

  async checkConnection(): Promise<TrackerUser> {
    const data = await this.fetchJson('/rest/api/3/myself', rawUserSchema);
    return { accountId: data.accountId, displayName: data.displayName ?? data.accountId };
  }

  async searchIssues(jql: string, options: SearchOptions = {}): Promise<Issue[]> {
    const limit = options.maxResults ?? DEFAULT_MAX_RESULTS;
    const issues: Issue[] = [];
    let pageToken: string | undefined;

    while (issues.length < limit) {
      const params = new URLSearchParams({
        jql,
        maxResults: String(Math.min(MAX_PAGE_SIZE, limit - issues.length)),
        fields: ISSUE_FIELDS.join(','),
      });
      if (options.expandChangelog) params.set('expand', 'changelog');
      if (pageToken) params.set('nextPageToken', pageToken);

      const page = await this.fetchJson(`/rest/api/3/search/jql?${params}`, searchPageSchema);

      for (const raw of page.issues) {
        const issue = this.toIssue(raw);
        if (issue) issues.push(issue);
      }

      if (page.isLast === true || !page.nextPageToken || page.issues.length === 0) break;
      pageToken = page.nextPageToken;
    }

    return issues.slice(0, limit);
  }

  async countIssues(jql: string): Promise<number> {
    const data = await this.fetchJson('/rest/api/3/search/approximate-count', countSchema, {
      method: 'POST',
      body: JSON.stringify({ jql }),
    });
    return data.count;
  }

  async findUser(query: string): Promise<TrackerUser | null> {
    const params = new URLSearchParams({ query, maxResults: '1' });
    const users = await this.fetchJson(`/rest/api/3/user/search?${params}`, z.array(rawUserSchema));
    const [user] = users;
    if (!user) return null;
    return { accountId: user.accountId, displayName: user.displayName ?? user.accountId };
  }

  async getLatestComment(issueKey: string): Promise<IssueComment | null> {
    const params = new URLSearchParams({ orderBy: '-created', maxResults: '1' });
    const page = await this.fetchJson(
      `/rest/api/3/issue/${encodeURIComponent(issueKey)}/comment?${params}`,
      commentPageSchema
    );
    const [comment] = page.comments;
    if (!comment) return null;
    return {
      issueKey,
      id: comment.id,
      authorId: comment.author?.accountId ?? '',
      authorName: comment.author?.displayName ?? 'unknown',
      createdAt: comment.created,
    };
  }

  // ─── Mapping ───────────────────────────────────────────────────

  /** Map one raw issue; a malformed record is logged and skipped */
  private toIssue(raw: unknown): Issue | null {
    const result = rawIssueSchema.safeParse(raw);
    if (!result.success) {
      const key = z.object({ key: z.string() }).safeParse(raw);
      this.logger.warn('jira', 'Skipping malformed issue record', {
        issue: key.success ? key.data.key : 'unknown',
        problems: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }

    const { key, fields, changelog } = result.data;
    const events: ChangeEvent[] = [];
    for (const history of changelog?.histories ?? []) {
      for (const item of history.items) {
        events.push({
          field: item.field,
          from: item.fromString ?? null,
          to: item.toString ?? null,
          timestamp: history.created,
          authorId: history.author?.accountId,
        });
      }
    }

    return {
      key,
      summary: fields.summary ?? '',
      status: fields.status.name,
      assigneeId: fields.assignee?.accountId,
      assigneeName: fields.assignee?.displayName ?? undefined,
      reporterName: fields.reporter?.displayName ?? 'unknown',
      priority: fields.priority?.name ?? 'None',
      createdAt: fields.created,
      updatedAt: fields.updated,
      components: (fields.components ?? []).map((c) => c.name),
      changelog: events,
    };
  }

  // ─── HTTP Helpers ──────────────────────────────────────────────

  /** Make an authenticated JSON request and validate the response body */
  private async fetchJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: { method?: 'GET' | 'POST'; body?: string } = {}
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method ?? 'GET',
        body: init.body,
        headers: {
          Authorization: this.authHeader,
          Accept: 'application/json',
          ...(init.body ? { 'Content-Type': 'application/json' } : {}),
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Jira request to ${url} failed: ${message}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new TrackerApiError(response.status, body, url);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ParseError(`Jira returned a non-JSON body for ${url}`);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new ParseError(
        `Unexpected Jira response for ${url}: ${first ? `${first.path.join('.')}: ${first.message}` : 'invalid'}`
      );
    }
    return result.data;
  }
}

// ─── Error Types ─────────────────────────────────────────────────

/** Non-2xx response from the Jira API */
export class TrackerApiError extends ConnectionError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`Jira API error ${status} for ${url}: ${body.slice(0, 200)}`);
    this.name = 'TrackerApiError';
  }
}

/** Create a Jira API client */
export function createJiraClient(options: JiraClientOptions): JiraClient {
  return new JiraClient(options);
}
