import type { CardId, GridPoint, StackId } from '@tilewalk/engine/runtime';

import type { CancelScheduled } from '../utils/scheduler.js';

export type AnimationSessionState = 'idle' | 'inFlight';

export interface AnimationSession {
  readonly id: number;
  readonly cardID: CardId;
  readonly stackID: StackId;
  readonly destination: GridPoint;
  readonly state: 'inFlight';
}

export interface AnimationSessionTarget {
  readonly cardID: CardId;
  readonly stackID: StackId;
  readonly destination: GridPoint;
}

/**
 * Sole owner of the in-flight session. `begin` refuses while a session is
 * active, so at most one session exists at a time; every other method
 * addresses a session by id and ignores ids that are no longer current.
 */
export interface AnimationSessionMachine {
  readonly state: AnimationSessionState;
  readonly active: AnimationSession | null;
  begin(target: AnimationSessionTarget): AnimationSession | null;
  attachCancel(sessionID: number, cancel: CancelScheduled): void;
  isCurrent(sessionID: number): boolean;
  complete(sessionID: number): AnimationSession | null;
  forceClear(): AnimationSession | null;
}

export function createAnimationSessionMachine(): AnimationSessionMachine {
  let active: AnimationSession | null = null;
  let cancelCommit: CancelScheduled | null = null;
  let nextId = 1;

  return {
    get state(): AnimationSessionState {
      return active === null ? 'idle' : 'inFlight';
    },

    get active(): AnimationSession | null {
      return active;
    },

    begin(target): AnimationSession | null {
      if (active !== null) {
        return null;
      }
      const session: AnimationSession = {
        id: nextId,
        cardID: target.cardID,
        stackID: target.stackID,
        destination: { x: target.destination.x, y: target.destination.y },
        state: 'inFlight',
      };
      nextId += 1;
      active = session;
      cancelCommit = null;
      return session;
    },

    attachCancel(sessionID, cancel): void {
      if (active?.id !== sessionID) {
        cancel();
        return;
      }
      cancelCommit = cancel;
    },

    isCurrent(sessionID): boolean {
      return active?.id === sessionID;
    },

    complete(sessionID): AnimationSession | null {
      if (active?.id !== sessionID) {
        return null;
      }
      const finished = active;
      active = null;
      cancelCommit = null;
      return finished;
    },

    forceClear(): AnimationSession | null {
      const cleared = active;
      if (cleared === null) {
        return null;
      }
      const cancel = cancelCommit;
      active = null;
      cancelCommit = null;
      cancel?.();
      return cleared;
    },
  };
}
