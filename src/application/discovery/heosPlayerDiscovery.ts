import { DISCOVERY_TIMING, type DiscoveryTiming } from '@/config/discovery';
import type { EntityKind } from '@/domain/heos/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { DiscoverySinkPort } from '@/ports/DiscoverySinkPort';
import type { HeosBridgePort, MembershipChangeListener } from '@/ports/HeosBridgePort';
import type { ScheduledTimer, TimerPort } from '@/ports/TimerPort';
import { SerialQueue } from '@/shared/async/serialQueue';
import { createLogger, errorMessage } from '@/shared/logging/logger';
import {
  runMembershipScan,
  withQueryTimeout,
  type MembershipScanSummary,
} from '@/application/discovery/membershipScan';

export type DiscoveryState = 'idle' | 'scanning' | 'backgroundActive';

export type ScanTrigger = 'manual' | 'background' | 'membership-change';

export interface HeosPlayerDiscoveryOptions {
  bridge: HeosBridgePort;
  sink: DiscoverySinkPort;
  clock: ClockPort;
  timers: TimerPort;
  timing?: DiscoveryTiming;
  /** Upper bound per bridge query. Unbounded when omitted. */
  queryTimeoutMs?: number;
}

type BackgroundJob = {
  timer: ScheduledTimer | null;
  cancelled: boolean;
};

const SUPPORTED_KINDS: readonly EntityKind[] = ['group', 'player'];

/**
 * Discovers the players and groups of one HEOS bridge and reacts to membership changes.
 *
 * Background ticks, on-demand scans and stop-scan purges share one serial queue, so a
 * purge never runs while a pass is still reporting results.
 */
export class HeosPlayerDiscovery implements MembershipChangeListener {
  private readonly log = createLogger('Discovery', 'HeosPlayers');
  private readonly queue = new SerialQueue();
  private readonly bridge: HeosBridgePort;
  private readonly sink: DiscoverySinkPort;
  private readonly clock: ClockPort;
  private readonly timers: TimerPort;
  private readonly timing: DiscoveryTiming;
  private backgroundJob: BackgroundJob | null = null;
  private searchWindow: ScheduledTimer | null = null;
  private lastScanTimestamp = 0;
  private activePasses = 0;

  constructor(options: HeosPlayerDiscoveryOptions) {
    this.sink = options.sink;
    this.clock = options.clock;
    this.timers = options.timers;
    this.timing = options.timing ?? DISCOVERY_TIMING;
    this.bridge =
      options.queryTimeoutMs !== undefined
        ? withQueryTimeout(options.bridge, options.timers, options.queryTimeoutMs, this.log)
        : options.bridge;
    options.bridge.registerMembershipChangeListener(this);
  }

  public get state(): DiscoveryState {
    if (this.activePasses > 0 || this.searchWindow) {
      return 'scanning';
    }
    return this.backgroundJob ? 'backgroundActive' : 'idle';
  }

  public get isBackgroundDiscoveryActive(): boolean {
    return this.backgroundJob !== null;
  }

  public getSupportedEntityKinds(): readonly EntityKind[] {
    return SUPPORTED_KINDS;
  }

  public getTimestampOfLastScan(): number {
    return this.lastScanTimestamp;
  }

  public startBackgroundDiscovery(): void {
    if (this.backgroundJob) {
      this.log.spam('background discovery already active');
      return;
    }
    const job: BackgroundJob = { timer: null, cancelled: false };
    this.backgroundJob = job;
    this.scheduleTick(job, this.timing.initialDelayMs);
    this.log.debug('background discovery started', {
      initialDelayMs: this.timing.initialDelayMs,
      intervalMs: this.timing.scanIntervalMs,
    });
  }

  public stopBackgroundDiscovery(): void {
    const job = this.backgroundJob;
    if (!job) {
      return;
    }
    job.cancelled = true;
    job.timer?.cancel();
    job.timer = null;
    this.backgroundJob = null;
    this.log.debug('background discovery stopped');
  }

  /**
   * Opens a manual scan session: purges results older than the previous session,
   * stamps this one and runs a pass. The session closes itself through
   * {@link stopScan} once the search window elapses.
   */
  public startScan(): Promise<MembershipScanSummary | null> {
    this.searchWindow?.cancel();
    this.searchWindow = this.timers.schedule(() => {
      this.searchWindow = null;
      void this.stopScan();
    }, this.timing.searchWindowMs);

    return this.queue.run(async () => {
      this.purgeStale();
      this.lastScanTimestamp = Math.max(this.lastScanTimestamp, this.clock.now());
      return this.runPass('manual');
    });
  }

  /**
   * Purge-then-scan outside the background schedule.
   */
  public scanForNewPlayers(trigger: ScanTrigger = 'membership-change'): Promise<MembershipScanSummary | null> {
    return this.queue.run(async () => {
      this.purgeStale();
      return this.runPass(trigger);
    });
  }

  /**
   * Closes the manual scan session and purges results older than its timestamp.
   */
  public stopScan(): Promise<number> {
    this.searchWindow?.cancel();
    this.searchWindow = null;
    return this.queue.run(async () => this.purgeStale());
  }

  public playerChanged(): void {
    this.log.debug('membership changed; scanning');
    void this.scanForNewPlayers('membership-change');
  }

  public async dispose(): Promise<void> {
    this.stopBackgroundDiscovery();
    this.searchWindow?.cancel();
    this.searchWindow = null;
    await this.queue.drain();
  }

  private scheduleTick(job: BackgroundJob, delayMs: number): void {
    job.timer = this.timers.schedule(() => {
      job.timer = null;
      void this.runTick(job);
    }, delayMs);
  }

  private async runTick(job: BackgroundJob): Promise<void> {
    await this.scanForNewPlayers('background');
    if (!job.cancelled) {
      this.scheduleTick(job, this.timing.scanIntervalMs);
    }
  }

  private purgeStale(): number {
    try {
      return this.sink.purgeResultsOlderThan(this.lastScanTimestamp);
    } catch (error) {
      this.log.warn('failed to purge stale results', { message: errorMessage(error) });
      return 0;
    }
  }

  private async runPass(trigger: ScanTrigger): Promise<MembershipScanSummary | null> {
    this.activePasses += 1;
    try {
      const summary = await runMembershipScan(this.bridge, this.sink, this.log);
      this.log.debug('scan pass finished', { trigger, ...summary });
      return summary;
    } catch (error) {
      this.log.warn('scan pass failed', { trigger, message: errorMessage(error) });
      return null;
    } finally {
      this.activePasses -= 1;
    }
  }
}
