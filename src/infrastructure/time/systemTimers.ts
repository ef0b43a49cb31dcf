import type { TimerPort } from '@/ports/TimerPort';

export const systemTimers: TimerPort = {
  schedule: (callback, delayMs) => {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    return {
      cancel: () => clearTimeout(handle),
    };
  },
};
