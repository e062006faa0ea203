import { DirectoryEntry, GroupedEntries } from '@/types/directory.types';
import { DataConsistencyFault, InvalidDnError, UnresolvedGroupError } from '@/services/base/errors';
import { cnFromDn } from './IdentityResolver';
import { IndexResult } from './types';

/**
 * Relational Indexer
 *
 * Builds the cross-referenced reports: computers by operating system and
 * users by group. Key order follows first occurrence, member order follows
 * input order, and an entry is listed under every key it belongs to.
 */

// Classification key for entries that lack the classifying attribute
export const UNKNOWN_KEY = 'Unknown';

function append(groups: GroupedEntries, key: string, entry: DirectoryEntry): void {
  const members = groups.get(key);
  if (members) {
    members.push(entry);
  } else {
    groups.set(key, [entry]);
  }
}

export function groupByOS(computers: readonly DirectoryEntry[]): GroupedEntries {
  const osdict: GroupedEntries = new Map();
  for (const computer of computers) {
    append(osdict, computer.getString('operatingSystem') ?? UNKNOWN_KEY, computer);
  }
  return osdict;
}

/**
 * Index users under every group in their memberOf plus their primary group.
 *
 * The primary group is not listed in memberOf; it is found by looking the
 * user's primaryGroupID up in the RID map. Every user has one, so a miss
 * means the map is stale or partial: the user is reported as a fault and
 * indexed under its other groups only.
 */
export function groupByMembership(
  users: readonly DirectoryEntry[],
  ridToName: ReadonlyMap<number, string>
): IndexResult {
  const groups: GroupedEntries = new Map();
  const faults: DataConsistencyFault[] = [];

  for (const user of users) {
    const ugroups: string[] = [];

    // If the user is only in its primary group, memberOf is absent
    for (const dn of user.getStrings('memberOf')) {
      try {
        ugroups.push(cnFromDn(dn));
      } catch (error) {
        if (!(error instanceof InvalidDnError)) throw error;
        faults.push(error);
      }
    }

    const primaryGroupId = user.getInteger('primaryGroupID');
    const primaryGroup = primaryGroupId === undefined ? undefined : ridToName.get(primaryGroupId);
    if (primaryGroup === undefined) {
      faults.push(new UnresolvedGroupError(user.dn, primaryGroupId));
    } else {
      ugroups.push(primaryGroup);
    }

    for (const group of ugroups) {
      append(groups, group, user);
    }
  }

  return { groups, faults };
}
