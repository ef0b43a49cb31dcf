import type { EntityRef, GroupMap, PlayerMap } from '@/domain/heos/types';

/**
 * Notified by the bridge whenever the system reports changed players or groups.
 */
export interface MembershipChangeListener {
  playerChanged: () => void;
}

/**
 * Membership view of a connected bridge as consumed by discovery.
 *
 * Each query drains the bridge's pending additions or removals. Draining must be
 * atomic: an entity is reported as new at most once until it is reported removed.
 * `null` from the addition queries means no data is available right now.
 */
export interface HeosBridgePort {
  readonly bridgeId: string;
  queryNewPlayers: () => Promise<PlayerMap | null>;
  queryNewGroups: () => Promise<GroupMap | null>;
  queryRemovedGroups: () => Promise<GroupMap>;
  queryRemovedPlayers: () => Promise<PlayerMap>;
  setEntityStatusOnline: (ref: EntityRef) => void;
  setEntityStatusOffline: (ref: EntityRef) => void;
  registerMembershipChangeListener: (listener: MembershipChangeListener) => void;
}
