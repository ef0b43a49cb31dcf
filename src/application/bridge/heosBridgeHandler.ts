import {
  BRIDGE_STARTUP_DELAY_MS,
  CHILD_DISPOSE_DELAY_MS,
  DEFAULT_RECONNECT_POLICY,
  reconnectDelayMs,
  type HeosBridgeConfig,
  type HeosReconnectPolicy,
} from '@/config/heos';
import type { EntityRef, GroupMap, PlayerMap } from '@/domain/heos/types';
import type { HeosBridgePort, MembershipChangeListener } from '@/ports/HeosBridgePort';
import type {
  HeosChangeEvent,
  HeosChangeListener,
  HeosFavorite,
  HeosSystemPort,
} from '@/ports/HeosSystemPort';
import type { ScheduledTimer, TimerPort } from '@/ports/TimerPort';
import { sleep } from '@/shared/async/timers';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, errorMessage, type ComponentLogger } from '@/shared/logging/logger';
import {
  EntityRegistry,
  refOf,
  type BridgeChannel,
  type ManagedEntity,
  type ManagedEntityRecord,
} from '@/application/bridge/entityRegistry';
import { MembershipTracker } from '@/application/bridge/membershipTracker';

export type BridgeConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disposing';

export type BridgeStatus =
  | { status: 'unknown' }
  | { status: 'online' }
  | { status: 'offline'; detail: 'communication_error' | 'none' };

export type BridgeStatusListener = (status: BridgeStatus) => void;

export interface HeosBridgeHandlerOptions {
  config: HeosBridgeConfig;
  system: HeosSystemPort;
  timers: TimerPort;
  reconnect?: HeosReconnectPolicy;
  startupDelayMs?: number;
  childDisposeDelayMs?: number;
}

/**
 * Session to one HEOS system and the membership view discovery consumes.
 *
 * Connection lifecycle: disconnected -> connecting -> connected, and
 * disposing -> disconnected. `initialize` outside `disconnected` is a no-op.
 */
export class HeosBridgeHandler implements HeosBridgePort {
  public readonly bridgeId: string;

  private readonly log: ComponentLogger;
  private readonly config: HeosBridgeConfig;
  private readonly system: HeosSystemPort;
  private readonly timers: TimerPort;
  private readonly reconnect: HeosReconnectPolicy;
  private readonly startupDelayMs: number;
  private readonly childDisposeDelayMs: number;
  private readonly tracker = new MembershipTracker();
  private readonly entities = new EntityRegistry();
  private readonly membershipListeners: MembershipChangeListener[] = [];
  private readonly statusListeners = new Set<BridgeStatusListener>();
  private readonly changeListener: HeosChangeListener = (event) => this.handleChangeEvent(event);

  private state: BridgeConnectionState = 'disconnected';
  private status: BridgeStatus = { status: 'unknown' };
  private registeredForChangeEvents = false;
  private loggedIn = false;
  private recoveryDelayRequested = false;
  private disposalOngoing = false;
  private connectAbort: AbortController | null = null;
  private startupTimer: ScheduledTimer | null = null;
  private retryTimer: ScheduledTimer | null = null;
  private favorites: HeosFavorite[] = [];
  private playlists: string[] = [];

  constructor(options: HeosBridgeHandlerOptions) {
    this.config = options.config;
    this.system = options.system;
    this.timers = options.timers;
    this.reconnect = options.reconnect ?? DEFAULT_RECONNECT_POLICY;
    this.startupDelayMs = options.startupDelayMs ?? BRIDGE_STARTUP_DELAY_MS;
    this.childDisposeDelayMs = options.childDisposeDelayMs ?? CHILD_DISPOSE_DELAY_MS;
    this.bridgeId = options.config.id;
    this.log = createLogger('Heos', 'Bridge', options.config.id);
  }

  public get connectionState(): BridgeConnectionState {
    return this.state;
  }

  public get bridgeStatus(): BridgeStatus {
    return this.status;
  }

  public get isLoggedIn(): boolean {
    return this.loggedIn;
  }

  public getFavorites(): readonly HeosFavorite[] {
    return this.favorites;
  }

  public getPlaylists(): readonly string[] {
    return this.playlists;
  }

  public getChannels(): BridgeChannel[] {
    return this.entities.listChannels();
  }

  public getEntity(ref: EntityRef): ManagedEntityRecord | undefined {
    return this.entities.get(ref);
  }

  public onStatusChange(listener: BridgeStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  /**
   * Connects with bounded, exponentially backed-off retries. Resolves `true` once the
   * session is up; the start-up step (event listener, heartbeat, login) follows after
   * the start-up delay.
   */
  public async initialize(): Promise<boolean> {
    if (this.state !== 'disconnected') {
      this.log.debug('initialize skipped', { state: this.state });
      return this.state === 'connected';
    }
    this.cancelRetry();
    this.state = 'connecting';
    this.loggedIn = false;
    const abort = new AbortController();
    this.connectAbort = abort;
    this.log.debug('initializing bridge', { name: this.config.name, host: this.config.host });

    const connected = await this.connectWithRetry(abort.signal);
    if (this.connectAbort === abort) {
      this.connectAbort = null;
    }

    if (abort.signal.aborted) {
      if (connected) {
        await this.closeConnection();
      }
      return false;
    }

    if (!connected) {
      this.state = 'disconnected';
      this.updateStatus({ status: 'offline', detail: 'communication_error' });
      this.log.warn('could not connect to HEOS system', {
        host: this.config.host,
        attempts: this.reconnect.maxAttempts,
        retryInMs: this.reconnect.maxDelayMs,
      });
      this.scheduleRetry();
      return false;
    }

    this.state = 'connected';
    if (!this.registeredForChangeEvents) {
      this.system.registerForChangeEvents(this.changeListener);
      this.registeredForChangeEvents = true;
    }
    this.scheduleStartup();
    this.recoveryDelayRequested = false;
    return true;
  }

  public async dispose(): Promise<void> {
    this.disposalOngoing = true;
    this.state = 'disposing';
    this.connectAbort?.abort();
    this.connectAbort = null;
    this.startupTimer?.cancel();
    this.startupTimer = null;
    this.cancelRetry();
    if (this.registeredForChangeEvents) {
      this.system.unregisterForChangeEvents(this.changeListener);
      this.registeredForChangeEvents = false;
      this.log.debug('bridge removed from change notifications');
    }
    this.loggedIn = false;
    this.log.debug('disposing bridge', { name: this.config.name });
    await this.closeConnection();
    this.state = 'disconnected';
  }

  public registerMembershipChangeListener(listener: MembershipChangeListener): void {
    this.membershipListeners.push(listener);
  }

  public handleChangeEvent(event: HeosChangeEvent): void {
    if (event.type === 'event') {
      switch (event.command) {
        case 'players_changed':
        case 'groups_changed':
          this.triggerPlayerDiscovery();
          return;
        case 'connection_lost':
          this.startupTimer?.cancel();
          this.startupTimer = null;
          if (this.state === 'connected') {
            this.state = 'disconnected';
          }
          this.updateStatus({ status: 'offline', detail: 'communication_error' });
          this.log.info('bridge offline');
          return;
        case 'connection_restored':
          if (this.state !== 'disconnected') {
            this.log.debug('connection restored ignored', { state: this.state });
            return;
          }
          this.recoveryDelayRequested = true;
          this.initialize().catch((error: unknown) => {
            this.log.warn('re-initialize failed', { message: errorMessage(error) });
          });
          return;
      }
    }

    if (event.command === 'sign_in' && event.result !== 'success') {
      return;
    }
    if (!this.loggedIn) {
      this.loggedIn = true;
      void this.loadAccountContent();
    }
  }

  public async queryNewPlayers(): Promise<PlayerMap | null> {
    if (this.state !== 'connected') {
      return null;
    }
    const snapshot = await this.system.fetchPlayers();
    if (!snapshot) {
      return null;
    }
    const summary = this.tracker.reconcilePlayers(snapshot);
    this.log.spam('players reconciled', summary);
    return this.tracker.takeNewPlayers();
  }

  public async queryNewGroups(): Promise<GroupMap | null> {
    if (this.state !== 'connected') {
      return null;
    }
    const snapshot = await this.system.fetchGroups();
    if (!snapshot) {
      return null;
    }
    const summary = this.tracker.reconcileGroups(snapshot);
    this.log.spam('groups reconciled', summary);
    return this.tracker.takeNewGroups();
  }

  public async queryRemovedGroups(): Promise<GroupMap> {
    return this.tracker.takeRemovedGroups();
  }

  public async queryRemovedPlayers(): Promise<PlayerMap> {
    return this.tracker.takeRemovedPlayers();
  }

  /**
   * Marks an attached entity online and refreshes its bridge channel, which changes
   * when a group gets a new leader. Unknown entities are ignored.
   */
  public setEntityStatusOnline(ref: EntityRef): void {
    const record = this.entities.setStatus(ref, 'online');
    if (!record) {
      return;
    }
    const entity = this.withCurrentLeader(record.entity);
    this.entities.updateEntity(entity);
    this.entities.upsertChannel(entity);
    this.log.debug('entity online', { kind: ref.kind, id: ref.id });
  }

  public setEntityStatusOffline(ref: EntityRef): void {
    if (this.entities.setStatus(ref, 'offline')) {
      this.log.debug('entity offline', { kind: ref.kind, id: ref.id });
    }
  }

  public childInitialized(entity: ManagedEntity): void {
    this.entities.attach(entity);
    this.entities.upsertChannel(entity);
    this.log.debug('child handler initialized', { kind: entity.kind, id: entity.id });
  }

  /**
   * Waits briefly before dropping the child's channel, unless the bridge itself is
   * being disposed. An interrupted wait is logged and the removal continues.
   */
  public async childDisposed(entity: ManagedEntity, signal?: AbortSignal): Promise<void> {
    try {
      await sleep(this.timers, this.childDisposeDelayMs, signal);
    } catch (error) {
      this.log.debug('child disposal wait interrupted', { message: errorMessage(error) });
    }
    const ref = refOf(entity);
    this.entities.detach(ref);
    if (this.disposalOngoing) {
      return;
    }
    this.entities.removeChannel(ref);
    this.log.debug('child handler disposed', { kind: entity.kind, id: entity.id });
  }

  private async connectWithRetry(signal: AbortSignal): Promise<boolean> {
    const target = { host: this.config.host, port: this.config.port };
    for (let attempt = 0; attempt < this.reconnect.maxAttempts; attempt += 1) {
      if (attempt > 0) {
        await this.closeConnection();
        try {
          await sleep(this.timers, reconnectDelayMs(this.reconnect, attempt - 1), signal);
        } catch (error) {
          this.log.debug('reconnect wait interrupted', { message: errorMessage(error) });
          return false;
        }
      }
      if (signal.aborted) {
        return false;
      }
      const withRecoveryDelay = attempt === 0 && this.recoveryDelayRequested;
      const connected = await bestEffort(
        () => this.system.establishConnection(target, withRecoveryDelay),
        { fallback: false, onError: 'debug', log: this.log, label: 'connection attempt failed' },
      );
      if (connected) {
        return true;
      }
      this.log.debug('could not initialize connection to HEOS system', { attempt: attempt + 1 });
    }
    return false;
  }

  private withCurrentLeader(entity: ManagedEntity): ManagedEntity {
    if (entity.kind !== 'group') {
      return entity;
    }
    const group = this.tracker.getGroup(entity.id);
    if (!group || group.gid === entity.groupId) {
      return entity;
    }
    this.log.debug('group leader changed', { hash: entity.id, from: entity.groupId, to: group.gid });
    return { ...entity, groupId: group.gid };
  }

  private scheduleRetry(): void {
    this.cancelRetry();
    this.retryTimer = this.timers.schedule(() => {
      this.retryTimer = null;
      this.initialize().catch((error: unknown) => {
        this.log.warn('re-initialize failed', { message: errorMessage(error) });
      });
    }, this.reconnect.maxDelayMs);
  }

  private cancelRetry(): void {
    this.retryTimer?.cancel();
    this.retryTimer = null;
  }

  private closeConnection(): Promise<void> {
    return bestEffort(() => this.system.closeConnection(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'close connection failed',
    });
  }

  private scheduleStartup(): void {
    this.startupTimer?.cancel();
    this.startupTimer = this.timers.schedule(() => {
      this.startupTimer = null;
      void this.runStartup();
    }, this.startupDelayMs);
  }

  private async runStartup(): Promise<void> {
    this.disposalOngoing = false;
    try {
      this.system.startEventListener();
      this.system.startHeartbeat(this.config.heartbeatSeconds);
    } catch (error) {
      this.log.warn('bridge start-up failed', { message: errorMessage(error) });
      this.updateStatus({ status: 'offline', detail: 'communication_error' });
      return;
    }
    this.log.debug('heart beat started', { pulseSeconds: this.config.heartbeatSeconds });

    const { username, password } = this.config;
    if (username && password) {
      this.log.debug('logging in to HEOS account');
      await bestEffort(() => this.system.logIn(username, password), {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'HEOS account login failed',
      });
    } else {
      this.log.info('can not log in; username and password not set');
    }
    this.updateStatus({ status: 'online' });
    this.log.debug('bridge online');
  }

  private async loadAccountContent(): Promise<void> {
    const options = { onError: 'debug', log: this.log } as const;
    this.favorites = await bestEffort(() => this.system.getFavorites(), {
      ...options,
      fallback: [],
      label: 'loading favorites failed',
    });
    this.playlists = await bestEffort(() => this.system.getPlaylists(), {
      ...options,
      fallback: [],
      label: 'loading playlists failed',
    });
    this.log.debug('account content loaded', {
      favorites: this.favorites.length,
      playlists: this.playlists.length,
    });
  }

  private triggerPlayerDiscovery(): void {
    for (const listener of this.membershipListeners) {
      try {
        listener.playerChanged();
      } catch (error) {
        this.log.warn('membership listener failed', { message: errorMessage(error) });
      }
    }
  }

  private updateStatus(status: BridgeStatus): void {
    this.status = status;
    for (const listener of this.statusListeners) {
      try {
        listener(status);
      } catch (error) {
        this.log.warn('status listener failed', { message: errorMessage(error) });
      }
    }
  }
}
