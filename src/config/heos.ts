export const DEFAULT_HEOS_PORT = 1255;
export const DEFAULT_HEARTBEAT_SECONDS = 60;

/**
 * Settings of one HEOS bridge, as entered for the bridge entity.
 */
export interface HeosBridgeConfig {
  id: string;
  name: string;
  host: string;
  port: number;
  heartbeatSeconds: number;
  username?: string;
  password?: string;
}

/**
 * Reconnect policy used while the bridge establishes its session.
 */
export interface HeosReconnectPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RECONNECT_POLICY: Readonly<HeosReconnectPolicy> = Object.freeze({
  maxAttempts: 6,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
});

/** Delay between a successful connect and the start-up step (event listener, heartbeat, login). */
export const BRIDGE_STARTUP_DELAY_MS = 10_000;

/** Pause before a detached child's channel is removed. */
export const CHILD_DISPOSE_DELAY_MS = 500;

export class BridgeConfigError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`invalid bridge config "${field}": ${message}`);
    this.name = 'BridgeConfigError';
  }
}

function readString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new BridgeConfigError(field, 'expected a string');
  }
  const trimmed = String(value).trim();
  return trimmed || undefined;
}

function readInteger(
  raw: Record<string, unknown>,
  field: string,
  fallback: number,
  range: { min: number; max: number },
): number {
  const value = readString(raw, field);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new BridgeConfigError(field, `expected an integer between ${range.min} and ${range.max}`);
  }
  return parsed;
}

/**
 * Validates a loosely typed configuration record (e.g. from the entity editor).
 */
export function parseBridgeConfig(raw: Record<string, unknown>): HeosBridgeConfig {
  const host = readString(raw, 'host');
  if (!host) {
    throw new BridgeConfigError('host', 'required');
  }
  const username = readString(raw, 'username');
  const password = readString(raw, 'password');
  const name = readString(raw, 'name') ?? host;

  return {
    id: readString(raw, 'id') ?? host,
    name,
    host,
    port: readInteger(raw, 'port', DEFAULT_HEOS_PORT, { min: 1, max: 65_535 }),
    heartbeatSeconds: readInteger(raw, 'heartbeat', DEFAULT_HEARTBEAT_SECONDS, { min: 1, max: 3_600 }),
    ...(username && password ? { username, password } : {}),
  };
}

/**
 * Backoff before reconnect attempt `attempt` (0 based): base * 2^attempt, capped.
 */
export function reconnectDelayMs(policy: HeosReconnectPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt));
}
