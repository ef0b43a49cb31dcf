export type ScheduledTimer = {
  cancel: () => void;
};

/**
 * One-shot timer scheduling, injected so schedulers can be driven by a manual clock in tests.
 */
export interface TimerPort {
  schedule: (callback: () => void, delayMs: number) => ScheduledTimer;
}
