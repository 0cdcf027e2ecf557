import {
  collectTopCardIds,
  findHandStack,
  moveCandidatesEqual,
  type CardId,
  type DealtCard,
  type GameStatePort,
  type HandStack,
  type MoveCandidate,
  type StackId,
} from '@tilewalk/engine/runtime';

import type { GuideHighlightEngine } from '../guide/guide-highlight-engine.js';
import type { CoordinatorLogger } from '../logging/coordinator-logger.js';
import type { BoardViewStoreApi } from '../store/board-view-store.js';
import type { HapticFeedback, RenderingSurface } from '../surface/rendering-surface.js';
import type { Scheduler } from '../utils/scheduler.js';
import { createAnimationSessionMachine, type AnimationSession } from './animation-session.js';

export type AnimationRejectReason =
  | 'animationInFlight'
  | 'positionUnknown'
  | 'stackMissing'
  | 'topCardChanged'
  | 'candidateStale'
  | 'noLegalMove';

export interface AnimationCoordinator {
  readonly isAnimating: boolean;
  readonly activeSession: AnimationSession | null;
  play(candidate: MoveCandidate): boolean;
  playStack(stackID: StackId): boolean;
  isCardUsable(stackID: StackId): boolean;
  handleHandChanged(hand: readonly HandStack[], nextCards: readonly DealtCard[]): void;
  setHapticsEnabled(enabled: boolean): void;
  reset(): void;
}

export interface AnimationCoordinatorDeps {
  readonly game: GameStatePort;
  readonly store: BoardViewStoreApi;
  readonly surface: RenderingSurface;
  readonly guide: Pick<GuideHighlightEngine, 'clearForcedSelection'>;
  readonly haptics: HapticFeedback;
  readonly scheduler: Scheduler;
  readonly logger: CoordinatorLogger;
  readonly travelDurationMs: number;
}

export function createAnimationCoordinator(deps: AnimationCoordinatorDeps): AnimationCoordinator {
  const { game, store, surface, guide, haptics, scheduler, logger } = deps;
  const machine = createAnimationSessionMachine();
  // Set while the game applies a committed move: the card leaving the hand
  // at that point is the expected outcome, not a reason to force-clear.
  let committingSessionID: number | null = null;

  const reject = (candidate: MoveCandidate, reason: AnimationRejectReason): false => {
    logger.logAnimation({
      event: 'rejected',
      cardID: candidate.cardID,
      stackID: candidate.stackID,
      destination: candidate.destination,
      reason,
    });
    return false;
  };

  const hideCard = (cardID: CardId): void => {
    const state = store.getState();
    if (!state.hiddenCardIDs.has(cardID)) {
      state.setHiddenCards({ hiddenCardIDs: new Set([...state.hiddenCardIDs, cardID]) });
    }
    surface.hideCard(cardID);
  };

  const unhideCard = (cardID: CardId): void => {
    const state = store.getState();
    if (!state.hiddenCardIDs.has(cardID)) {
      return;
    }
    const next = new Set(state.hiddenCardIDs);
    next.delete(cardID);
    state.setHiddenCards({ hiddenCardIDs: next });
    surface.showCard(cardID);
  };

  const clearAnimationState = (): void => {
    store.getState().setAnimationState({ animationSession: null, animationTarget: null });
    surface.setAnimationTarget(null);
  };

  const forceClear = (reason: string): void => {
    const cleared = machine.forceClear();
    if (cleared === null) {
      return;
    }
    unhideCard(cleared.cardID);
    clearAnimationState();
    logger.logAnimation({
      event: 'forceCleared',
      cardID: cleared.cardID,
      stackID: cleared.stackID,
      destination: cleared.destination,
      reason,
    });
  };

  const commit = (session: AnimationSession, candidate: MoveCandidate): void => {
    if (!machine.isCurrent(session.id)) {
      logger.logAnimation({ event: 'staleCommit', cardID: session.cardID, stackID: session.stackID });
      return;
    }

    committingSessionID = session.id;
    let failure: string | null = null;
    try {
      game.playMove(candidate);
    } catch (error) {
      failure = error instanceof Error ? error.message : String(error);
    }
    committingSessionID = null;
    unhideCard(session.cardID);
    if (machine.complete(session.id) !== null) {
      clearAnimationState();
    }

    // Runs inside a scheduler callback, so a failed play is logged rather than thrown.
    logger.logAnimation({
      event: failure === null ? 'committed' : 'commitFailed',
      cardID: session.cardID,
      stackID: session.stackID,
      destination: session.destination,
      ...(failure === null ? {} : { reason: failure }),
    });
  };

  const findLiveCandidate = (stackID: StackId): MoveCandidate | undefined => {
    const stack = findHandStack(game.getSnapshot().hand, stackID);
    const topCard = stack?.topCard ?? null;
    if (topCard === null) {
      return undefined;
    }
    return game.availableMoves().find((candidate) => candidate.stackID === stackID && candidate.cardID === topCard.id);
  };

  const play = (candidate: MoveCandidate): boolean => {
    if (machine.active !== null) {
      return reject(candidate, 'animationInFlight');
    }

    const snapshot = game.getSnapshot();
    if (snapshot.current === null) {
      return reject(candidate, 'positionUnknown');
    }

    const stack = findHandStack(snapshot.hand, candidate.stackID);
    if (stack === undefined) {
      return reject(candidate, 'stackMissing');
    }
    if (stack.topCard === null || stack.topCard.id !== candidate.cardID) {
      return reject(candidate, 'topCardChanged');
    }

    const live = game.availableMoves().find((move) => moveCandidatesEqual(move, candidate));
    if (live === undefined) {
      return reject(candidate, 'candidateStale');
    }

    const session = machine.begin({
      cardID: live.cardID,
      stackID: live.stackID,
      destination: live.destination,
    });
    if (session === null) {
      return reject(candidate, 'animationInFlight');
    }

    surface.setAnimationTarget(session.destination);
    hideCard(session.cardID);
    store.getState().setAnimationState({ animationSession: session, animationTarget: session.destination });
    guide.clearForcedSelection();
    if (store.getState().hapticsEnabled) {
      haptics.notify('success');
    }
    logger.logAnimation({
      event: 'started',
      cardID: session.cardID,
      stackID: session.stackID,
      destination: session.destination,
    });

    const cancel = scheduler.schedule(() => {
      commit(session, live);
    }, deps.travelDurationMs);
    machine.attachCancel(session.id, cancel);
    return true;
  };

  return {
    get isAnimating(): boolean {
      return machine.state === 'inFlight';
    },

    get activeSession(): AnimationSession | null {
      return machine.active;
    },

    play,

    playStack(stackID): boolean {
      const candidate = findLiveCandidate(stackID);
      if (candidate === undefined) {
        logger.logAnimation({ event: 'rejected', stackID, reason: 'noLegalMove' });
        return false;
      }
      return play(candidate);
    },

    isCardUsable(stackID): boolean {
      return findLiveCandidate(stackID) !== undefined;
    },

    handleHandChanged(hand, nextCards): void {
      const state = store.getState();
      const nextTopCardIDs = new Map<StackId, CardId>();
      const released = new Set<CardId>();

      for (const stack of hand) {
        if (stack.topCard === null) {
          continue;
        }
        const previousTopID = state.topCardIDsByStack.get(stack.stackID);
        if (previousTopID !== undefined && previousTopID !== stack.topCard.id) {
          released.add(previousTopID);
        }
        nextTopCardIDs.set(stack.stackID, stack.topCard.id);
      }
      for (const [stackID, previousTopID] of state.topCardIDsByStack) {
        if (!nextTopCardIDs.has(stackID)) {
          released.add(previousTopID);
        }
      }

      const validIDs = new Set<CardId>([...collectTopCardIds(hand), ...nextCards.map((card) => card.id)]);
      const hiddenCardIDs = new Set<CardId>();
      for (const cardID of state.hiddenCardIDs) {
        if (validIDs.has(cardID) && !released.has(cardID)) {
          hiddenCardIDs.add(cardID);
        } else {
          surface.showCard(cardID);
        }
      }
      state.setHiddenCards({ hiddenCardIDs, topCardIDsByStack: nextTopCardIDs });

      const active = machine.active;
      if (active !== null && active.id !== committingSessionID && !validIDs.has(active.cardID)) {
        forceClear('cardLeftHand');
      }
    },

    setHapticsEnabled(enabled): void {
      store.getState().setHapticsEnabled(enabled);
    },

    reset(): void {
      forceClear('teardown');
      for (const cardID of store.getState().hiddenCardIDs) {
        surface.showCard(cardID);
      }
      store.getState().setHiddenCards({ hiddenCardIDs: new Set(), topCardIDsByStack: new Map() });
      clearAnimationState();
    },
  };
}
