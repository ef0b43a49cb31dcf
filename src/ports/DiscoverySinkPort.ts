import type { DiscoveryResult, EntityRef } from '@/domain/heos/types';

export interface DiscoverySinkPort {
  entityDiscovered: (result: DiscoveryResult) => void;
  entityRemoved: (ref: EntityRef) => void;
  /** Drops results last confirmed before `timestamp` (ms). Returns how many were dropped. */
  purgeResultsOlderThan: (timestamp: number) => number;
}
