/**
 * One networked HEOS audio endpoint as reported by the system.
 */
export interface HeosPlayer {
  /** Device-assigned identifier, stable across sessions. */
  pid: string;
  name: string;
  model: string;
  ip: string;
}

/**
 * A synchronized playback cluster. `memberPids` keeps the order reported by the system.
 */
export interface HeosGroup {
  /** Group id as reported by the system (the leader pid). Not stable across regrouping. */
  gid: string;
  name: string;
  memberPids: string[];
}

export type EntityKind = 'player' | 'group';

/**
 * Reference to a managed player or group. Player ids are pids, group ids are member hashes.
 */
export type EntityRef = { kind: 'player'; id: string } | { kind: 'group'; id: string };

export type EntityStatus = 'online' | 'offline' | 'unknown';

export type PlayerProperties = {
  name: string;
  pid: string;
  type: string;
  host: string;
};

export type GroupProperties = {
  name: string;
  groupMembers: string;
};

export type DiscoveryResult =
  | {
      ref: { kind: 'player'; id: string };
      label: string;
      properties: PlayerProperties;
      bridgeId: string;
    }
  | {
      ref: { kind: 'group'; id: string };
      label: string;
      properties: GroupProperties;
      bridgeId: string;
    };

export type PlayerMap = ReadonlyMap<string, HeosPlayer>;
export type GroupMap = ReadonlyMap<string, HeosGroup>;

export function playerRef(pid: string): EntityRef {
  return { kind: 'player', id: pid };
}

export function groupRef(hash: string): EntityRef {
  return { kind: 'group', id: hash };
}

/** Flat key usable in maps, e.g. `player:1234` or `group:98765`. */
export function entityKey(ref: EntityRef): string {
  return `${ref.kind}:${ref.id}`;
}
