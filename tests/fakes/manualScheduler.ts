import type { ClockPort } from '../../src/ports/ClockPort';
import type { ScheduledTimer, TimerPort } from '../../src/ports/TimerPort';

type PendingTimer = {
  id: number;
  due: number;
  callback: () => void;
};

/**
 * Lets pending promise callbacks (including chained awaits) run to completion.
 */
export async function flushAsync(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * Clock and timers driven by `advance`, so scheduling can be tested without waiting.
 */
export class ManualScheduler implements ClockPort, TimerPort {
  private current: number;
  private nextId = 0;
  private pending: PendingTimer[] = [];

  constructor(start = 1_000) {
    this.current = start;
  }

  public now(): number {
    return this.current;
  }

  public schedule(callback: () => void, delayMs: number): ScheduledTimer {
    this.nextId += 1;
    const timer: PendingTimer = {
      id: this.nextId,
      due: this.current + Math.max(0, delayMs),
      callback,
    };
    this.pending.push(timer);
    return {
      cancel: () => {
        this.pending = this.pending.filter((entry) => entry !== timer);
      },
    };
  }

  public get pendingTimers(): number {
    return this.pending.length;
  }

  /** Delays (relative to now) of all pending timers, soonest first. */
  public pendingDelays(): number[] {
    return this.pending
      .map((timer) => timer.due - this.current)
      .sort((left, right) => left - right);
  }

  public async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    await flushAsync();
    for (;;) {
      const next = this.pending
        .filter((timer) => timer.due <= target)
        .sort((left, right) => left.due - right.due || left.id - right.id)[0];
      if (!next) {
        break;
      }
      this.pending = this.pending.filter((timer) => timer !== next);
      this.current = next.due;
      next.callback();
      await flushAsync();
    }
    this.current = target;
    await flushAsync();
  }
}
