import { isPlayablePhase, type GamePhase } from '@tilewalk/engine/runtime';

import type { CoordinatorLogger, SuspensionLogEntry } from '../logging/coordinator-logger.js';
import type { BoardViewStoreApi } from '../store/board-view-store.js';
import type { SessionClockControl } from '../surface/rendering-surface.js';

export const SUSPENSION_REASONS = ['menuOpen', 'backgrounded', 'loadingOverlay', 'interstitialAd'] as const;

export type SuspensionReason = (typeof SUSPENSION_REASONS)[number];

export interface TimerSuspensionCoordinator {
  readonly activeReasons: readonly SuspensionReason[];
  readonly isSuspended: boolean;
  readonly phase: GamePhase;
  /**
   * Adds or removes one reason. Returns `true` when the reason set changed;
   * `false` for no-ops and for removals attempted by someone other than the
   * owner that added the reason.
   */
  setReason(reason: SuspensionReason, active: boolean, owner?: string): boolean;
  setPhase(phase: GamePhase): void;
  reset(): void;
}

export interface TimerSuspensionCoordinatorDeps {
  readonly clock: SessionClockControl;
  readonly store: BoardViewStoreApi;
  readonly logger: CoordinatorLogger;
  readonly initialPhase?: GamePhase;
}

export function createTimerSuspensionCoordinator(deps: TimerSuspensionCoordinatorDeps): TimerSuspensionCoordinator {
  const { clock, store, logger } = deps;
  // Insertion-ordered: reason -> owner.
  const reasons = new Map<SuspensionReason, string>();
  let phase: GamePhase = deps.initialPhase ?? 'awaitingStart';

  const activeReasons = (): readonly SuspensionReason[] => [...reasons.keys()];

  const log = (event: SuspensionLogEntry['event'], reason?: SuspensionReason): void => {
    logger.logSuspension({
      event,
      ...(reason === undefined ? {} : { reason }),
      activeReasons: activeReasons(),
      phase,
    });
  };

  const publish = (): void => {
    store.getState().setSuspensionReasons(activeReasons());
  };

  return {
    get activeReasons(): readonly SuspensionReason[] {
      return activeReasons();
    },

    get isSuspended(): boolean {
      return reasons.size > 0;
    },

    get phase(): GamePhase {
      return phase;
    },

    setReason(reason, active, owner = reason): boolean {
      if (active) {
        if (reasons.has(reason)) {
          return false;
        }
        const wasEmpty = reasons.size === 0;
        reasons.set(reason, owner);
        publish();
        log('reasonAdded', reason);
        if (wasEmpty && isPlayablePhase(phase)) {
          clock.pause();
          log('pause', reason);
        }
        return true;
      }

      const currentOwner = reasons.get(reason);
      if (currentOwner === undefined) {
        return false;
      }
      if (currentOwner !== owner) {
        log('reasonRejected', reason);
        return false;
      }

      reasons.delete(reason);
      publish();
      log('reasonRemoved', reason);
      if (reasons.size === 0 && isPlayablePhase(phase)) {
        clock.resume();
        log('resume', reason);
      }
      return true;
    },

    setPhase(next): void {
      const wasPlayable = isPlayablePhase(phase);
      phase = next;
      if (!wasPlayable && isPlayablePhase(next) && reasons.size > 0) {
        clock.pause();
        log('pause');
      }
    },

    reset(): void {
      reasons.clear();
      publish();
      log('reset');
    },
  };
}
