import { groupIdentity, groupMembersAsString, playerIdentity } from '@/domain/heos/identity';
import { groupRef, playerRef } from '@/domain/heos/types';
import type { DiscoveryResult, HeosGroup, HeosPlayer } from '@/domain/heos/types';
import type { HeosBridgePort } from '@/ports/HeosBridgePort';
import type { DiscoverySinkPort } from '@/ports/DiscoverySinkPort';
import type { TimerPort } from '@/ports/TimerPort';
import { withTimeout } from '@/shared/async/timers';
import type { ComponentLogger } from '@/shared/logging/logger';

export type ScanAbortReason = 'players_unavailable' | 'groups_unavailable';

export interface MembershipScanSummary {
  aborted: ScanAbortReason | null;
  playersDiscovered: number;
  groupsDiscovered: number;
  groupsRemoved: number;
  playersRemoved: number;
}

export function buildPlayerResult(player: HeosPlayer, bridgeId: string): DiscoveryResult {
  return {
    ref: { kind: 'player', id: playerIdentity(player) },
    label: player.name,
    properties: {
      name: player.name,
      pid: player.pid,
      type: player.model,
      host: player.ip,
    },
    bridgeId,
  };
}

export function buildGroupResult(group: HeosGroup, bridgeId: string): DiscoveryResult {
  return {
    ref: { kind: 'group', id: groupIdentity(group) },
    label: group.name,
    properties: {
      name: group.name,
      groupMembers: groupMembersAsString(group),
    },
    bridgeId,
  };
}

/**
 * One scan pass: reports the bridge's pending additions, then its pending removals.
 *
 * Players are announced before groups so a group never references an undiscovered
 * player. Absent player or group data ends the whole pass, removals included; they
 * stay pending on the bridge for the next pass.
 */
export async function runMembershipScan(
  bridge: HeosBridgePort,
  sink: DiscoverySinkPort,
  log: ComponentLogger,
): Promise<MembershipScanSummary> {
  const summary: MembershipScanSummary = {
    aborted: null,
    playersDiscovered: 0,
    groupsDiscovered: 0,
    groupsRemoved: 0,
    playersRemoved: 0,
  };

  log.debug('scanning for new players');
  const players = await bridge.queryNewPlayers();
  if (!players) {
    log.debug('player data unavailable; scan aborted');
    return { ...summary, aborted: 'players_unavailable' };
  }
  log.debug('new players found', { count: players.size });
  for (const player of players.values()) {
    const result = buildPlayerResult(player, bridge.bridgeId);
    log.spam('player discovered', { pid: player.pid, name: player.name });
    sink.entityDiscovered(result);
    summary.playersDiscovered += 1;
  }

  log.debug('scanning for new groups');
  const groups = await bridge.queryNewGroups();
  if (!groups) {
    log.debug('group data unavailable; scan aborted');
    return { ...summary, aborted: 'groups_unavailable' };
  }
  if (groups.size === 0) {
    log.debug('no new groups found');
  } else {
    log.debug('new groups found', { count: groups.size });
  }
  for (const group of groups.values()) {
    const result = buildGroupResult(group, bridge.bridgeId);
    log.spam('group discovered', { hash: result.ref.id, name: group.name });
    sink.entityDiscovered(result);
    // Groups have no creation flow of their own; their entity is activated here.
    bridge.setEntityStatusOnline(result.ref);
    summary.groupsDiscovered += 1;
  }

  const removedGroups = await bridge.queryRemovedGroups();
  for (const group of removedGroups.values()) {
    const ref = groupRef(groupIdentity(group));
    log.debug('group removed', { hash: ref.id, name: group.name });
    sink.entityRemoved(ref);
    bridge.setEntityStatusOffline(ref);
    summary.groupsRemoved += 1;
  }

  const removedPlayers = await bridge.queryRemovedPlayers();
  for (const player of removedPlayers.values()) {
    log.debug('player removed', { pid: player.pid });
    sink.entityRemoved(playerRef(playerIdentity(player)));
    summary.playersRemoved += 1;
  }

  return summary;
}

export class ScanQueryTimeoutError extends Error {
  constructor(
    public readonly query: string,
    public readonly timeoutMs: number,
  ) {
    super(`bridge query ${query} timed out after ${timeoutMs}ms`);
    this.name = 'ScanQueryTimeoutError';
  }
}

/**
 * Wraps the bridge so a hung addition query counts as absent data and a hung
 * removal query fails the pass. A query that completes after its deadline still
 * drains the bridge, so its entries are lost for this session.
 */
export function withQueryTimeout(
  bridge: HeosBridgePort,
  timers: TimerPort,
  timeoutMs: number,
  log: ComponentLogger,
): HeosBridgePort {
  const bounded = async <T>(query: string, run: () => Promise<T>, onTimeout: () => T): Promise<T> => {
    const outcome = await withTimeout(timers, run(), timeoutMs);
    if (outcome.kind === 'value') {
      return outcome.value;
    }
    log.warn('bridge query timed out', { query, timeoutMs });
    return onTimeout();
  };

  return {
    bridgeId: bridge.bridgeId,
    queryNewPlayers: () => bounded('newPlayers', () => bridge.queryNewPlayers(), () => null),
    queryNewGroups: () => bounded('newGroups', () => bridge.queryNewGroups(), () => null),
    queryRemovedGroups: () =>
      bounded('removedGroups', () => bridge.queryRemovedGroups(), () => {
        throw new ScanQueryTimeoutError('removedGroups', timeoutMs);
      }),
    queryRemovedPlayers: () =>
      bounded('removedPlayers', () => bridge.queryRemovedPlayers(), () => {
        throw new ScanQueryTimeoutError('removedPlayers', timeoutMs);
      }),
    setEntityStatusOnline: (ref) => bridge.setEntityStatusOnline(ref),
    setEntityStatusOffline: (ref) => bridge.setEntityStatusOffline(ref),
    registerMembershipChangeListener: (listener) => bridge.registerMembershipChangeListener(listener),
  };
}
