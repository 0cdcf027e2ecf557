import type { SessionClockControl } from '../surface/rendering-surface.js';

export type SessionClockState = 'idle' | 'running' | 'paused' | 'finished';

/**
 * Wall-clock play timer. Paused spans are excluded from the elapsed time;
 * `finalize` freezes the total.
 */
export interface SessionClock extends SessionClockControl {
  readonly state: SessionClockState;
  /** Live elapsed time, rounded to whole seconds. */
  readonly elapsedSeconds: number;
  start(): void;
  finalize(): number;
}

export interface SessionClockOptions {
  readonly now?: () => number;
}

export function createSessionClock(options: SessionClockOptions = {}): SessionClock {
  const now = options.now ?? Date.now;
  let state: SessionClockState = 'idle';
  let accumulatedMs = 0;
  let runningSince: number | null = null;

  const elapsedMs = (): number =>
    accumulatedMs + (runningSince === null ? 0 : Math.max(0, now() - runningSince));

  const stopRunning = (): void => {
    accumulatedMs = elapsedMs();
    runningSince = null;
  };

  return {
    get state(): SessionClockState {
      return state;
    },

    get elapsedSeconds(): number {
      return Math.round(elapsedMs() / 1000);
    },

    start(): void {
      accumulatedMs = 0;
      runningSince = now();
      state = 'running';
    },

    pause(): void {
      if (state !== 'running') {
        return;
      }
      stopRunning();
      state = 'paused';
    },

    resume(): void {
      if (state !== 'paused') {
        return;
      }
      runningSince = now();
      state = 'running';
    },

    finalize(): number {
      if (state === 'running') {
        stopRunning();
      }
      if (state !== 'idle') {
        state = 'finished';
      }
      return Math.round(accumulatedMs / 1000);
    },
  };
}
