import type { GridPoint } from '@tilewalk/engine/runtime';

import type { CancelScheduled, Scheduler } from '../utils/scheduler.js';

export interface ConflictWarning {
  readonly id: number;
  readonly message: string;
  readonly destination: GridPoint;
}

export interface ConflictWarningChannelOptions {
  readonly scheduler: Scheduler;
  readonly durationMs: number;
  readonly onShow: (warning: ConflictWarning) => void;
  readonly onDismiss: (warning: ConflictWarning) => void;
}

/**
 * One-shot warning slot. Showing a warning replaces the active one; each
 * warning expires after `durationMs` unless dismissed first.
 */
export interface ConflictWarningChannel {
  readonly active: ConflictWarning | null;
  show(message: string, destination: GridPoint): ConflictWarning;
  dismiss(warningID: number): boolean;
  clear(): void;
}

export function createConflictWarningChannel(options: ConflictWarningChannelOptions): ConflictWarningChannel {
  let active: ConflictWarning | null = null;
  let cancelExpiry: CancelScheduled | null = null;
  let nextId = 1;

  const stopExpiry = (): void => {
    cancelExpiry?.();
    cancelExpiry = null;
  };

  const dismissActive = (): void => {
    const current = active;
    if (current === null) {
      return;
    }
    stopExpiry();
    active = null;
    options.onDismiss(current);
  };

  return {
    get active(): ConflictWarning | null {
      return active;
    },

    show(message, destination): ConflictWarning {
      dismissActive();
      const warning: ConflictWarning = { id: nextId, message, destination: { x: destination.x, y: destination.y } };
      nextId += 1;
      active = warning;
      cancelExpiry = options.scheduler.schedule(() => {
        cancelExpiry = null;
        if (active?.id === warning.id) {
          dismissActive();
        }
      }, options.durationMs);
      options.onShow(warning);
      return warning;
    },

    dismiss(warningID): boolean {
      if (active?.id !== warningID) {
        return false;
      }
      dismissActive();
      return true;
    },

    clear(): void {
      dismissActive();
    },
  };
}
