import type { ConnectOutcome } from '@/types/device';

import type { ReconnectScheduler, ReconnectSchedulerHandlers, SchedulerState } from './types';

interface SchedulerOptions {
  intervalTicks: number;
  tickMs: number;
}

/**
 * Flat-interval retry loop. One tick per `tickMs`; when the counter runs out a
 * single connect is issued and no further tick is scheduled until its outcome
 * is known. Retries are unbounded; only `stop()` or a successful connect end
 * the loop.
 */
export const createReconnectScheduler = (
  handlers: ReconnectSchedulerHandlers,
  { intervalTicks, tickMs }: SchedulerOptions,
): ReconnectScheduler => {
  let state: SchedulerState = 'idle';
  let running = false;
  let remaining = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  // Bumped on every start/stop so a stale connect outcome can be recognised.
  let generation = 0;

  const clearTimer = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const scheduleTick = () => {
    clearTimer();
    timer = setTimeout(tick, tickMs);
  };

  const attempt = async () => {
    const current = generation;
    state = 'connecting';
    handlers.onAttempt?.();

    let outcome: ConnectOutcome;
    try {
      outcome = await handlers.connect();
    } catch (error) {
      console.error('[Scheduler] Connection error', error);
      outcome = {
        status: 'UNEXPECTED_ERROR',
        errorMessage: error instanceof Error ? error.message : String(error),
      };
    }

    if (current !== generation || !running) {
      return;
    }

    if (outcome.status === 'CONNECTED') {
      running = false;
      state = 'connected';
      remaining = 0;
      handlers.onOutcome?.(outcome);
      return;
    }

    remaining = intervalTicks;
    state = 'countingDown';
    handlers.onOutcome?.(outcome);
    if (running && current === generation) {
      scheduleTick();
    }
  };

  function tick() {
    timer = null;
    if (!running) {
      return;
    }

    remaining -= 1;
    if (remaining > 0) {
      handlers.onCountdown?.(remaining);
      scheduleTick();
      return;
    }

    remaining = 0;
    attempt().catch((error) => console.error('[Scheduler] Reconnect attempt failed', error));
  }

  return {
    start: ({ immediate = false } = {}) => {
      if (running) {
        return;
      }

      generation += 1;
      running = true;
      state = 'countingDown';
      remaining = immediate ? 1 : intervalTicks;
      scheduleTick();
    },
    stop: () => {
      generation += 1;
      running = false;
      state = 'idle';
      remaining = 0;
      clearTimer();
    },
    get state() {
      return state;
    },
    get isRunning() {
      return running;
    },
    get secondsRemaining() {
      return remaining;
    },
  };
};
