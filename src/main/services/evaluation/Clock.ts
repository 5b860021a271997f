import { performance } from 'node:perf_hooks';

export interface Clock {
  getWallclockTime(): Date;
  // milissegundos, apenas para comparacao relativa
  getMonotonicTime(): number;
}

export type CancelScheduledTask = () => void;

export interface Scheduler {
  schedule(delayMs: number, task: () => void): CancelScheduledTask;
}

export class SystemClock implements Clock {
  getWallclockTime(): Date {
    return new Date();
  }

  getMonotonicTime(): number {
    return performance.now();
  }
}

// setTimeout dispara em 1 ms acima deste valor
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export class TimerScheduler implements Scheduler {
  schedule(delayMs: number, task: () => void): CancelScheduledTask {
    let remainingMs = Math.max(0, Math.ceil(delayMs));
    let timer: NodeJS.Timeout | null = null;

    const arm = (): void => {
      const stepMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
      remainingMs -= stepMs;
      timer = setTimeout(() => {
        timer = null;
        if (remainingMs > 0) {
          arm();
          return;
        }
        task();
      }, stepMs);
      timer.unref();
    };

    arm();
    return () => {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };
  }
}
