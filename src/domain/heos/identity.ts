import { crc32 } from 'crc';
import type { HeosGroup, HeosPlayer } from '@/domain/heos/types';

export const GROUP_MEMBER_SEPARATOR = ';';

export function playerIdentity(player: Pick<HeosPlayer, 'pid'>): string {
  return player.pid;
}

/**
 * Unsigned CRC32 over the sorted, de-duplicated member pids, rendered in decimal.
 * Reordering the members of a group yields the same identifier.
 */
export function groupMemberHash(memberPids: readonly string[]): string {
  const canonical = Array.from(new Set(memberPids.map((pid) => pid.trim()).filter(Boolean)))
    .sort()
    .join(GROUP_MEMBER_SEPARATOR);
  return (crc32(canonical) >>> 0).toString(10);
}

export function groupIdentity(group: Pick<HeosGroup, 'memberPids'>): string {
  return groupMemberHash(group.memberPids);
}

export function groupMembersAsString(group: Pick<HeosGroup, 'memberPids'>): string {
  return group.memberPids.join(GROUP_MEMBER_SEPARATOR);
}
