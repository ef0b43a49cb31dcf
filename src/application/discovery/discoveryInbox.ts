import { entityKey, type DiscoveryResult, type EntityRef } from '@/domain/heos/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { DiscoverySinkPort } from '@/ports/DiscoverySinkPort';
import { createLogger, errorMessage } from '@/shared/logging/logger';

export interface InboxEntry {
  result: DiscoveryResult;
  /** Time (ms) the result was last reported. */
  timestamp: number;
}

export type InboxChange =
  | { type: 'added' | 'updated'; entry: InboxEntry }
  | { type: 'removed' | 'purged'; ref: EntityRef };

export type InboxListener = (change: InboxChange) => void;

/**
 * In-process store of discovery results pending adoption.
 */
export class DiscoveryInbox implements DiscoverySinkPort {
  private readonly log = createLogger('Discovery', 'Inbox');
  private readonly entries = new Map<string, InboxEntry>();
  private readonly listeners = new Set<InboxListener>();

  constructor(private readonly clock: ClockPort) {}

  public entityDiscovered(result: DiscoveryResult): void {
    const key = entityKey(result.ref);
    const entry: InboxEntry = { result, timestamp: this.clock.now() };
    const existing = this.entries.has(key);
    this.entries.set(key, entry);
    this.log.debug(existing ? 'result updated' : 'result added', { key, label: result.label });
    this.emit({ type: existing ? 'updated' : 'added', entry });
  }

  public entityRemoved(ref: EntityRef): void {
    const key = entityKey(ref);
    if (!this.entries.delete(key)) {
      return;
    }
    this.log.debug('result removed', { key });
    this.emit({ type: 'removed', ref });
  }

  public purgeResultsOlderThan(timestamp: number): number {
    let purged = 0;
    for (const [key, entry] of this.entries) {
      if (entry.timestamp >= timestamp) {
        continue;
      }
      this.entries.delete(key);
      purged += 1;
      this.emit({ type: 'purged', ref: entry.result.ref });
    }
    if (purged > 0) {
      this.log.debug('stale results purged', { purged, olderThan: timestamp });
    }
    return purged;
  }

  public get(ref: EntityRef): InboxEntry | undefined {
    return this.entries.get(entityKey(ref));
  }

  public list(): InboxEntry[] {
    return Array.from(this.entries.values());
  }

  public get size(): number {
    return this.entries.size;
  }

  public subscribe(listener: InboxListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: InboxChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.log.warn('inbox listener failed', { type: change.type, message: errorMessage(error) });
      }
    }
  }
}
