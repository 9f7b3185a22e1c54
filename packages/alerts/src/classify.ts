import type { IssueComment, TeamDirectory } from '@flowpulse/core';
import { normalizeName } from '@flowpulse/integrations';

export type AuthorClass = 'internal' | 'external';

/**
 * A comment author is internal when their account id, or failing that
 * their display name, belongs to the team directory's internal sets.
 */
export function classifyAuthor(comment: IssueComment, team: TeamDirectory): AuthorClass {
  if (comment.authorId && team.internalIds.has(comment.authorId)) return 'internal';
  if (team.internalNames.has(normalizeName(comment.authorName))) return 'internal';
  return 'external';
}
