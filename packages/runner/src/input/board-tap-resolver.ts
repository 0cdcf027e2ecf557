import {
  candidatesReaching,
  findHandStack,
  type GameStatePort,
  type GridPoint,
  type HandStack,
  type MoveCandidate,
  type StackId,
} from '@tilewalk/engine/runtime';

import type { AnimationCoordinator } from '../animation/animation-coordinator.js';
import { classifyMoveCandidate } from '../guide/classify-move-candidates.js';
import type { GuideHighlightEngine } from '../guide/guide-highlight-engine.js';
import type { CoordinatorLogger } from '../logging/coordinator-logger.js';
import type { BoardViewStoreApi, SelectedCard } from '../store/board-view-store.js';
import type { HapticFeedback } from '../surface/rendering-surface.js';
import type { ConflictWarning, ConflictWarningChannel } from '../warning/conflict-warning-channel.js';

export const CONFLICT_WARNING_MESSAGE = 'Several cards can reach this cell. Pick a card first.';

export interface BoardTapRequest {
  readonly destination: GridPoint;
  readonly candidateMoves: readonly MoveCandidate[];
}

export type BoardTapOutcome =
  | { readonly kind: 'played'; readonly candidate: MoveCandidate }
  | { readonly kind: 'rejected'; readonly candidate: MoveCandidate }
  | { readonly kind: 'ignored' }
  | { readonly kind: 'noCandidate' }
  | { readonly kind: 'conflict'; readonly warning: ConflictWarning; readonly stackIDs: readonly StackId[] }
  | { readonly kind: 'selectionRefreshed' };

export interface BoardTapResolver {
  resolve(request: BoardTapRequest): BoardTapOutcome;
  selectCard(stackID: StackId): boolean;
  clearSelection(): void;
  handleHandChanged(hand: readonly HandStack[]): void;
  refreshSelectionHighlight(): boolean;
}

export interface BoardTapResolverDeps {
  readonly game: GameStatePort;
  readonly store: BoardViewStoreApi;
  readonly guide: Pick<GuideHighlightEngine, 'setForcedSelection' | 'clearForcedSelection'>;
  readonly animation: Pick<AnimationCoordinator, 'play' | 'isAnimating'>;
  readonly warnings: ConflictWarningChannel;
  readonly haptics: HapticFeedback;
  readonly logger: CoordinatorLogger;
}

function distinctStackIDs(candidates: readonly MoveCandidate[]): readonly StackId[] {
  return [...new Set(candidates.map((candidate) => candidate.stackID))];
}

export function createBoardTapResolver(deps: BoardTapResolverDeps): BoardTapResolver {
  const { game, store, guide, animation, warnings, haptics, logger } = deps;

  const clearSelection = (): void => {
    if (store.getState().selectedCard !== null) {
      store.getState().setSelectedCard(null);
    }
    guide.clearForcedSelection();
  };

  const highlightSelection = (selected: SelectedCard): boolean => {
    const snapshot = game.getSnapshot();
    const topCard = findHandStack(snapshot.hand, selected.stackID)?.topCard ?? null;
    if (topCard === null || topCard.id !== selected.cardID) {
      clearSelection();
      return false;
    }

    const destinations = game.availableMoves()
      .filter((candidate) => candidate.stackID === selected.stackID && candidate.cardID === selected.cardID)
      .map((candidate) => candidate.destination);
    guide.setForcedSelection(destinations, topCard.kind === 'standard'
      ? { origin: snapshot.current, movementVectors: topCard.movementVectors }
      : {});
    return true;
  };

  const play = (
    candidate: MoveCandidate,
    request: BoardTapRequest,
    onAccepted?: () => void,
  ): BoardTapOutcome => {
    const accepted = animation.play(candidate);
    if (accepted) {
      onAccepted?.();
    }
    const outcome: BoardTapOutcome = accepted ? { kind: 'played', candidate } : { kind: 'rejected', candidate };
    logger.logTap({
      outcome: outcome.kind,
      destination: request.destination,
      candidateCount: request.candidateMoves.length,
    });
    return outcome;
  };

  const resolveWithSelection = (selected: SelectedCard, request: BoardTapRequest): BoardTapOutcome => {
    const ownMoves = request.candidateMoves.filter(
      (candidate) => candidate.stackID === selected.stackID && candidate.cardID === selected.cardID,
    );
    const match = candidatesReaching(ownMoves, request.destination)[0];
    if (match === undefined) {
      highlightSelection(selected);
      logger.logTap({
        outcome: 'selectionRefreshed',
        destination: request.destination,
        candidateCount: ownMoves.length,
      });
      return { kind: 'selectionRefreshed' };
    }
    // A rejected play keeps the selection so the player can tap again.
    return play(match, request, clearSelection);
  };

  const resolveWithoutSelection = (request: BoardTapRequest): BoardTapOutcome => {
    const reaching = candidatesReaching(request.candidateMoves, request.destination);
    const first = reaching[0];
    if (first === undefined) {
      logger.logTap({ outcome: 'noCandidate', destination: request.destination, candidateCount: 0 });
      return { kind: 'noCandidate' };
    }

    const singleVector = reaching.find((candidate) => classifyMoveCandidate(candidate) === 'singleVector');
    if (singleVector !== undefined) {
      return play(singleVector, request);
    }

    const stackIDs = distinctStackIDs(reaching);
    if (stackIDs.length === 1) {
      return play(first, request);
    }

    const warning = warnings.show(CONFLICT_WARNING_MESSAGE, request.destination);
    if (store.getState().hapticsEnabled) {
      haptics.notify('warning');
    }
    logger.logTap({
      outcome: 'conflict',
      destination: request.destination,
      candidateCount: reaching.length,
      stackCount: stackIDs.length,
    });
    return { kind: 'conflict', warning, stackIDs };
  };

  return {
    resolve(request): BoardTapOutcome {
      if (animation.isAnimating) {
        logger.logTap({
          outcome: 'ignored',
          destination: request.destination,
          candidateCount: request.candidateMoves.length,
        });
        return { kind: 'ignored' };
      }

      const selected = store.getState().selectedCard;
      return selected === null ? resolveWithoutSelection(request) : resolveWithSelection(selected, request);
    },

    selectCard(stackID): boolean {
      if (animation.isAnimating) {
        return false;
      }
      const topCard = findHandStack(game.getSnapshot().hand, stackID)?.topCard ?? null;
      if (topCard === null) {
        return false;
      }
      const selected: SelectedCard = { stackID, cardID: topCard.id };
      store.getState().setSelectedCard(selected);
      return highlightSelection(selected);
    },

    clearSelection,

    handleHandChanged(hand): void {
      const selected = store.getState().selectedCard;
      if (selected === null) {
        return;
      }
      const topCard = findHandStack(hand, selected.stackID)?.topCard ?? null;
      if (topCard === null || topCard.id !== selected.cardID) {
        clearSelection();
      }
    },

    refreshSelectionHighlight(): boolean {
      const selected = store.getState().selectedCard;
      if (selected === null) {
        return false;
      }
      return highlightSelection(selected);
    },
  };
}
