/**
 * Team directory construction.
 * Resolves the configured display-name lists to tracker account ids once
 * at startup. Resolution is best-effort: names that match no account, or
 * whose lookup fails, are logged and left out.
 */

import {
  errorMessage,
  getLogger,
  type Logger,
  type TeamDirectory,
  type TeamGroup,
  type TrackerClient,
} from '@flowpulse/core';

/** Name lists as they appear in configuration */
export interface TeamNames {
  developerNames: string[];
  qaNames: string[];
  pmNames: string[];
  /** Extra internal accounts, given either as account ids or names */
  internalUsers: string[];
}

/**
 * Build an account id → display name map for one role group.
 */
export async function buildAccountMap(
  client: TrackerClient,
  names: readonly string[],
  group: TeamGroup,
  logger: Logger = getLogger()
): Promise<Map<string, string>> {
  const map = new Map<string, string>();

  if (names.length === 0) {
    logger.warn('users', `No names configured for ${group}`);
    return map;
  }

  logger.info('users', `Resolving account ids for ${group}`, { names });

  for (const name of names) {
    try {
      const user = await client.findUser(name);
      if (user) {
        map.set(user.accountId, user.displayName);
        logger.info('users', `Resolved "${user.displayName}"`, { group, accountId: user.accountId });
      } else {
        logger.warn('users', `No account found for "${name}"`, { group });
      }
    } catch (error) {
      logger.error('users', `Lookup failed for "${name}": ${errorMessage(error)}`, { group });
    }
  }

  return map;
}

/**
 * Resolve every role group and derive the internal-author sets used to
 * classify comment authors.
 */
export async function buildTeamDirectory(
  client: TrackerClient,
  names: TeamNames,
  logger: Logger = getLogger()
): Promise<TeamDirectory> {
  const developers = await buildAccountMap(client, names.developerNames, 'developers', logger);
  const qa = await buildAccountMap(client, names.qaNames, 'qa', logger);
  const pm = await buildAccountMap(client, names.pmNames, 'pm', logger);

  const internalIds = new Set<string>([...developers.keys(), ...qa.keys(), ...pm.keys()]);
  const internalNames = new Set<string>(
    [
      ...developers.values(),
      ...qa.values(),
      ...pm.values(),
      ...names.developerNames,
      ...names.qaNames,
      ...names.pmNames,
    ].map(normalizeName)
  );

  for (const entry of names.internalUsers) {
    internalIds.add(entry);
    internalNames.add(normalizeName(entry));
  }

  if (developers.size === 0 && qa.size === 0 && pm.size === 0) {
    logger.warn('users', 'No users resolved in any group; check DEVELOPER_LIST, QA_LIST and PM_LIST');
  }

  return { developers, qa, pm, internalIds, internalNames };
}

/** Display names are compared case-insensitively, whitespace-collapsed */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}
