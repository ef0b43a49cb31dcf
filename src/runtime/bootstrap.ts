import { loadConfig } from '@/config';
import type { DiscoveryTiming } from '@/config/discovery';
import type { HeosReconnectPolicy } from '@/config/heos';
import { HeosBridgeHandler } from '@/application/bridge/heosBridgeHandler';
import { DiscoveryInbox } from '@/application/discovery/discoveryInbox';
import { HeosPlayerDiscovery } from '@/application/discovery/heosPlayerDiscovery';
import { systemClock } from '@/infrastructure/time/systemClock';
import { systemTimers } from '@/infrastructure/time/systemTimers';
import type { ClockPort } from '@/ports/ClockPort';
import type { DiscoverySinkPort } from '@/ports/DiscoverySinkPort';
import type { HeosSystemPort } from '@/ports/HeosSystemPort';
import type { TimerPort } from '@/ports/TimerPort';
import { createLogger, logManager } from '@/shared/logging/logger';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

const STOP_TIMEOUT_MS = 5_000;

export interface RuntimeOptions {
  /** Raw bridge settings, validated by `parseBridgeConfig`. */
  bridge: Record<string, unknown>;
  system: HeosSystemPort;
  /** Receives discovery results; an in-process inbox is created when omitted. */
  sink?: DiscoverySinkPort;
  clock?: ClockPort;
  timers?: TimerPort;
  timing?: DiscoveryTiming;
  reconnect?: HeosReconnectPolicy;
  queryTimeoutMs?: number;
}

export type Runtime = {
  bridge: HeosBridgeHandler;
  discovery: HeosPlayerDiscovery;
  sink: DiscoverySinkPort;
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

/**
 * Wires one bridge, its discovery service and the result sink.
 */
export function createRuntime(options: RuntimeOptions): Runtime {
  const config = loadConfig(options.bridge);
  logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
  const log = createLogger('Runtime');
  const clock = options.clock ?? systemClock;
  const timers = options.timers ?? systemTimers;
  const sink = options.sink ?? new DiscoveryInbox(clock);

  const bridge = new HeosBridgeHandler({
    config: config.bridge,
    system: options.system,
    timers,
    reconnect: options.reconnect,
  });
  const discovery = new HeosPlayerDiscovery({
    bridge,
    sink,
    clock,
    timers,
    timing: options.timing ?? config.discovery,
    queryTimeoutMs: options.queryTimeoutMs,
  });

  const start = async (): Promise<void> => {
    log.info('starting HEOS discovery', { bridge: config.bridge.id, host: config.bridge.host });
    const connected = await bridge.initialize();
    if (!connected) {
      log.warn('bridge not connected yet; retrying in the background');
    }
    discovery.startBackgroundDiscovery();
  };

  const stop = async (): Promise<void> => {
    await stopWithTimeout('discovery', () => discovery.dispose(), STOP_TIMEOUT_MS, log);
    await stopWithTimeout('bridge', () => bridge.dispose(), STOP_TIMEOUT_MS, log);
  };

  return { bridge, discovery, sink, start, stop };
}
