/**
 * Interfaces of the external collaborators the engines depend on.
 * Implementations live in @flowpulse/integrations; tests supply fakes.
 */

import type { Issue, IssueComment, TrackerUser } from './types.js';

export interface SearchOptions {
  /** Include the status changelog of each issue */
  expandChangelog?: boolean;
  /** Upper bound on returned issues */
  maxResults?: number;
}

/**
 * Read-only view of the issue tracker.
 */
export interface TrackerClient {
  /** Verify credentials and reachability; throws ConnectionError */
  checkConnection(): Promise<TrackerUser>;

  /** Run a JQL query and return a bounded list of issues */
  searchIssues(jql: string, options?: SearchOptions): Promise<Issue[]>;

  /** Count issues matching a JQL query without fetching them */
  countIssues(jql: string): Promise<number>;

  /** Resolve an account id or free-text name to the best matching account */
  findUser(query: string): Promise<TrackerUser | null>;

  /** Most recent comment on an issue, or null when it has none */
  getLatestComment(issueKey: string): Promise<IssueComment | null>;
}

/**
 * Destination for alert messages. Throws TransportError on failure.
 */
export interface AlertSink {
  readonly name: string;
  send(message: string): Promise<void>;
}
