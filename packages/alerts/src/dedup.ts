/**
 * Alert de-duplication state.
 *
 * Per ticket, the id of the last comment that triggered an alert:
 * `NoAlertSent -> Alerted(id)`; re-evaluating the same id is a no-op and a
 * different id alerts again. Owned by the cycle worker and lives as long
 * as the process.
 *
 * Entries can optionally be evicted once a ticket has not been seen for a
 * number of cycles. Eviction is off by default: an evicted ticket whose
 * latest comment is unchanged would alert a second time.
 */

interface DedupEntry {
  commentId: string;
  /** Last cycle the ticket showed up in an alert query */
  lastSeenCycle: number;
}

export class AlertDedupState {
  private readonly entries = new Map<string, DedupEntry>();

  /** True unless `commentId` is the last one alerted for this ticket */
  shouldAlert(issueKey: string, commentId: string): boolean {
    return this.entries.get(issueKey)?.commentId !== commentId;
  }

  /** Record the comment as alerted for this ticket */
  record(issueKey: string, commentId: string, cycle: number): void {
    this.entries.set(issueKey, { commentId, lastSeenCycle: cycle });
  }

  /** Mark a ticket as seen in this cycle */
  touch(issueKey: string, cycle: number): void {
    const entry = this.entries.get(issueKey);
    if (entry) entry.lastSeenCycle = cycle;
  }

  /**
   * Evict tickets not seen for more than `maxIdleCycles` cycles.
   * A value of 0 disables eviction. Returns the number evicted.
   */
  sweep(cycle: number, maxIdleCycles: number): number {
    if (maxIdleCycles <= 0) return 0;

    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (cycle - entry.lastSeenCycle > maxIdleCycles) {
        this.entries.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  lastAlerted(issueKey: string): string | undefined {
    return this.entries.get(issueKey)?.commentId;
  }

  get size(): number {
    return this.entries.size;
  }
}
