import { entityKey, type EntityRef, type EntityStatus } from '@/domain/heos/types';

/**
 * A player or group entity adopted under the bridge.
 */
export type ManagedEntity =
  | { kind: 'player'; id: string; name: string; pid: string }
  | { kind: 'group'; id: string; name: string; groupId: string };

export type ManagedEntityRecord = {
  entity: ManagedEntity;
  status: EntityStatus;
};

/**
 * Bridge channel used to select a player or group on the bridge entity.
 */
export type BridgeChannel = {
  id: string;
  label: string;
  pid: string;
};

export function refOf(entity: ManagedEntity): EntityRef {
  return { kind: entity.kind, id: entity.id };
}

/** `P<id>` for players, `G<id>` for groups. */
export function channelIdFor(ref: EntityRef): string {
  switch (ref.kind) {
    case 'player':
      return `P${ref.id}`;
    case 'group':
      return `G${ref.id}`;
  }
}

export function buildBridgeChannel(entity: ManagedEntity): BridgeChannel {
  switch (entity.kind) {
    case 'player':
      return { id: channelIdFor(refOf(entity)), label: entity.name, pid: entity.pid };
    case 'group':
      return { id: channelIdFor(refOf(entity)), label: entity.name, pid: entity.groupId };
  }
}

/**
 * Entities attached to a bridge and the bridge channels derived from them.
 */
export class EntityRegistry {
  private readonly records = new Map<string, ManagedEntityRecord>();
  private readonly channels = new Map<string, BridgeChannel>();

  public attach(entity: ManagedEntity): ManagedEntityRecord {
    const key = entityKey(refOf(entity));
    const record: ManagedEntityRecord = {
      entity,
      status: this.records.get(key)?.status ?? 'unknown',
    };
    this.records.set(key, record);
    return record;
  }

  public detach(ref: EntityRef): ManagedEntityRecord | undefined {
    const key = entityKey(ref);
    const record = this.records.get(key);
    this.records.delete(key);
    return record;
  }

  public get(ref: EntityRef): ManagedEntityRecord | undefined {
    return this.records.get(entityKey(ref));
  }

  /** Replaces the entity of an attached record, keeping its status. */
  public updateEntity(entity: ManagedEntity): ManagedEntityRecord | undefined {
    const record = this.records.get(entityKey(refOf(entity)));
    if (!record) {
      return undefined;
    }
    record.entity = entity;
    return record;
  }

  public setStatus(ref: EntityRef, status: EntityStatus): ManagedEntityRecord | undefined {
    const record = this.records.get(entityKey(ref));
    if (!record) {
      return undefined;
    }
    record.status = status;
    return record;
  }

  /** Adds or replaces the channel of `entity`. */
  public upsertChannel(entity: ManagedEntity): BridgeChannel {
    const channel = buildBridgeChannel(entity);
    this.channels.set(channel.id, channel);
    return channel;
  }

  public removeChannel(ref: EntityRef): boolean {
    return this.channels.delete(channelIdFor(ref));
  }

  public listChannels(): BridgeChannel[] {
    return Array.from(this.channels.values());
  }
}
