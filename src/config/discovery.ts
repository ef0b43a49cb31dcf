/**
 * Fixed timing of the player/group discovery service.
 */
export interface DiscoveryTiming {
  /** How long a manual scan session stays open before it is stopped. */
  searchWindowMs: number;
  /** Delay before the first background scan. */
  initialDelayMs: number;
  /** Pause between the end of one background scan and the start of the next. */
  scanIntervalMs: number;
}

export const DISCOVERY_TIMING: Readonly<DiscoveryTiming> = Object.freeze({
  searchWindowMs: 5_000,
  initialDelayMs: 5_000,
  scanIntervalMs: 20_000,
});
