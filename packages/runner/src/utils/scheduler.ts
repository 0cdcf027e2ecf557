export type CancelScheduled = () => void;

export interface Scheduler {
  schedule(callback: () => void, delayMs: number): CancelScheduled;
}

export const timeoutScheduler: Scheduler = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return (): void => {
      clearTimeout(handle);
    };
  },
};
