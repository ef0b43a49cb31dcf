import { groupIdentity } from '@/domain/heos/identity';
import type { GroupMap, HeosGroup, HeosPlayer, PlayerMap } from '@/domain/heos/types';

export type ReconcileSummary = {
  added: number;
  changed: number;
  removed: number;
};

function samePlayer(left: HeosPlayer, right: HeosPlayer): boolean {
  return left.name === right.name && left.model === right.model && left.ip === right.ip;
}

function sameGroup(left: HeosGroup, right: HeosGroup): boolean {
  return left.name === right.name && left.gid === right.gid;
}

/**
 * Last observed players and groups plus the additions and removals not yet reported.
 *
 * A key is pending as new at most once until it has been reported removed. `take*`
 * calls drain their pending set synchronously, so two scans never see the same entry.
 */
class KnownEntityCache<T> {
  private readonly known = new Map<string, T>();
  private readonly pendingNew = new Map<string, T>();
  private readonly pendingRemoved = new Map<string, T>();

  constructor(
    private readonly keyOf: (entity: T) => string,
    private readonly equals: (left: T, right: T) => boolean,
  ) {}

  public reconcile(snapshot: readonly T[]): ReconcileSummary {
    const current = new Map<string, T>();
    for (const entity of snapshot) {
      current.set(this.keyOf(entity), entity);
    }

    let added = 0;
    let changed = 0;
    let removed = 0;

    for (const [key, entity] of current) {
      const previous = this.known.get(key);
      if (!previous) {
        added += 1;
        this.pendingRemoved.delete(key);
        this.pendingNew.set(key, entity);
      } else if (!this.equals(previous, entity)) {
        // Reported as new again so the discovery result is refreshed in place.
        changed += 1;
        this.pendingNew.set(key, entity);
      }
      this.known.set(key, entity);
    }

    for (const [key, entity] of this.known) {
      if (current.has(key)) {
        continue;
      }
      removed += 1;
      this.known.delete(key);
      this.pendingNew.delete(key);
      this.pendingRemoved.set(key, entity);
    }

    return { added, changed, removed };
  }

  public takeNew(): ReadonlyMap<string, T> {
    return drain(this.pendingNew);
  }

  public takeRemoved(): ReadonlyMap<string, T> {
    return drain(this.pendingRemoved);
  }

  public get(key: string): T | undefined {
    return this.known.get(key);
  }

  public values(): T[] {
    return Array.from(this.known.values());
  }

  public clear(): void {
    this.known.clear();
    this.pendingNew.clear();
    this.pendingRemoved.clear();
  }
}

function drain<T>(source: Map<string, T>): ReadonlyMap<string, T> {
  const snapshot = new Map(source);
  source.clear();
  return snapshot;
}

/**
 * Known-entity cache of a bridge: players keyed by pid, groups by member hash.
 */
export class MembershipTracker {
  private readonly players = new KnownEntityCache<HeosPlayer>((player) => player.pid, samePlayer);
  private readonly groups = new KnownEntityCache<HeosGroup>(groupIdentity, sameGroup);

  public reconcilePlayers(snapshot: readonly HeosPlayer[]): ReconcileSummary {
    return this.players.reconcile(snapshot);
  }

  public reconcileGroups(snapshot: readonly HeosGroup[]): ReconcileSummary {
    return this.groups.reconcile(snapshot);
  }

  public takeNewPlayers(): PlayerMap {
    return this.players.takeNew();
  }

  public takeNewGroups(): GroupMap {
    return this.groups.takeNew();
  }

  public takeRemovedPlayers(): PlayerMap {
    return this.players.takeRemoved();
  }

  public takeRemovedGroups(): GroupMap {
    return this.groups.takeRemoved();
  }

  public getPlayer(pid: string): HeosPlayer | undefined {
    return this.players.get(pid);
  }

  public getGroup(hash: string): HeosGroup | undefined {
    return this.groups.get(hash);
  }

  public listPlayers(): HeosPlayer[] {
    return this.players.values();
  }

  public listGroups(): HeosGroup[] {
    return this.groups.values();
  }

  public reset(): void {
    this.players.clear();
    this.groups.clear();
  }
}
