import { RunningState } from './types';

// setTimeout fires at once for delays above 2^31 - 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type HeartbeatMonitor = {
  readonly armed: boolean;
  start(): void;
  stop(): void;
};

export type HeartbeatOptions = {
  intervalMs: number;
  state: Pick<RunningState, 'startedAt' | 'lastForwardedAt'>;
  emit: (now: number) => void;
  now?: () => number;
};

/**
 * Emits a heartbeat once `intervalMs` has passed since the last forwarded
 * line (or start-up). Forwarded lines move `state.lastForwardedAt`; the timer
 * reads it on every wake-up and sleeps for whatever is left of the interval.
 * An interval of zero or less leaves the monitor idle.
 */
export function createHeartbeatMonitor(options: HeartbeatOptions): HeartbeatMonitor {
  const { intervalMs, state, emit } = options;
  const now = options.now ?? Date.now;
  const armed = Number.isFinite(intervalMs) && intervalMs > 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let running = false;

  function reference(): number {
    return state.lastForwardedAt ?? state.startedAt;
  }

  function scheduleNext(): void {
    if (!running) return;
    if (timer) clearTimeout(timer);

    const delay = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, reference() + intervalMs - now()));
    timer = setTimeout(check, delay);
  }

  function check(): void {
    timer = null;
    if (!running) return;

    const current = now();
    if (current - reference() >= intervalMs) {
      state.lastForwardedAt = current;
      emit(current);
    }
    scheduleNext();
  }

  return {
    armed,

    start(): void {
      if (!armed || running) return;
      running = true;
      scheduleNext();
    },

    stop(): void {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    }
  };
}
