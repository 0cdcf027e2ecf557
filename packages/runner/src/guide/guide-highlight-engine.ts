import {
  gridPointListsEqual,
  isPlayablePhase,
  offsetGridPoint,
  toGridPointList,
  type GamePhase,
  type GameStatePort,
  type GridPoint,
  type HandStack,
  type MoveVector,
} from '@tilewalk/engine/runtime';

import type { CoordinatorLogger } from '../logging/coordinator-logger.js';
import type { BoardViewStoreApi, GuidePhase, PendingGuideSnapshot } from '../store/board-view-store.js';
import type { RenderingSurface } from '../surface/rendering-surface.js';
import { classifyMoveCandidates } from './classify-move-candidates.js';
import {
  boardHighlightsEqual,
  countGuideCells,
  EMPTY_BOARD_HIGHLIGHTS,
  EMPTY_GUIDE_BUCKETS,
  type BoardHighlights,
  type GuideHighlightBuckets,
} from './guide-highlight-buckets.js';

export interface GuideRefreshOverrides {
  readonly hand?: readonly HandStack[];
  /** `null` means "position unknown"; omit to read the live position. */
  readonly current?: GridPoint | null;
  readonly phase?: GamePhase;
}

export interface ForcedSelectionOptions {
  readonly origin?: GridPoint | null;
  readonly movementVectors?: readonly MoveVector[];
}

export interface GuideHighlightEngine {
  refresh(overrides?: GuideRefreshOverrides): BoardHighlights;
  setGuideEnabled(enabled: boolean): void;
  handlePhaseChange(phase: GamePhase): void;
  setForcedSelection(points: Iterable<GridPoint>, options?: ForcedSelectionOptions): boolean;
  clearForcedSelection(): boolean;
  reset(): void;
}

export interface GuideHighlightEngineDeps {
  readonly game: GameStatePort;
  readonly store: BoardViewStoreApi;
  readonly surface: RenderingSurface;
  readonly logger: CoordinatorLogger;
}

export function createGuideHighlightEngine(deps: GuideHighlightEngineDeps): GuideHighlightEngine {
  const { game, store, surface, logger } = deps;
  let hasPushed = false;

  const pushIfChanged = (next: BoardHighlights): { readonly highlights: BoardHighlights; readonly pushed: boolean } => {
    const previous = store.getState().highlights;
    if (hasPushed && boardHighlightsEqual(previous, next)) {
      return { highlights: previous, pushed: false };
    }
    hasPushed = true;
    surface.applyHighlights(next);
    return { highlights: next, pushed: true };
  };

  const publish = (
    guidePhase: GuidePhase,
    buckets: GuideHighlightBuckets,
    pendingGuide: PendingGuideSnapshot | null,
    forcedSelection: readonly GridPoint[] = store.getState().highlights.forcedSelection,
  ): BoardHighlights => {
    const { highlights, pushed } = pushIfChanged({ ...buckets, forcedSelection });
    store.getState().setGuideState({ guidePhase, highlights, pendingGuide });
    logger.logGuideRefresh({ guidePhase, ...countGuideCells(buckets), pushed });
    return highlights;
  };

  const refresh = (overrides: GuideRefreshOverrides = {}): BoardHighlights => {
    const snapshot = game.getSnapshot();
    const hand = overrides.hand ?? snapshot.hand;
    const phase = overrides.phase ?? snapshot.phase;
    const current = overrides.current === undefined ? snapshot.current : overrides.current;

    if (current === null) {
      return publish('positionUnknown', EMPTY_GUIDE_BUCKETS, { hand, current: null, buckets: null });
    }
    if (!store.getState().guideEnabled) {
      return publish('guideDisabled', EMPTY_GUIDE_BUCKETS, null);
    }

    const computed = classifyMoveCandidates(game.availableMoves(hand, current));
    if (!isPlayablePhase(phase)) {
      return publish('pausedPhase', EMPTY_GUIDE_BUCKETS, { hand, current, buckets: computed });
    }
    return publish('playablePhase', computed, null);
  };

  const setForcedSelection = (points: Iterable<GridPoint>, options: ForcedSelectionOptions = {}): boolean => {
    const requested: GridPoint[] = [...points];
    const origin = options.origin ?? null;
    if (origin !== null) {
      for (const vector of options.movementVectors ?? []) {
        requested.push(offsetGridPoint(origin, vector.dx, vector.dy));
      }
    }

    const forcedSelection = toGridPointList(requested.filter((point) => game.isTraversable(point)));
    const state = store.getState();
    if (gridPointListsEqual(state.highlights.forcedSelection, forcedSelection)) {
      return false;
    }

    const { highlights } = pushIfChanged({ ...state.highlights, forcedSelection });
    state.setHighlights(highlights);
    return true;
  };

  return {
    refresh,

    setGuideEnabled(enabled): void {
      store.getState().setGuideEnabled(enabled);
      if (enabled) {
        refresh();
        return;
      }
      publish('guideDisabled', EMPTY_GUIDE_BUCKETS, null);
    },

    handlePhaseChange(phase): void {
      if (isPlayablePhase(phase)) {
        const pending = store.getState().pendingGuide;
        if (pending === null) {
          refresh({ phase });
          return;
        }
        refresh({
          hand: pending.hand,
          phase,
          ...(pending.current === null ? {} : { current: pending.current }),
        });
        return;
      }

      if (phase === 'cleared') {
        publish('pausedPhase', EMPTY_GUIDE_BUCKETS, null, []);
        return;
      }

      setForcedSelection([]);
      refresh({ phase });
    },

    setForcedSelection,

    clearForcedSelection(): boolean {
      return setForcedSelection([]);
    },

    reset(): void {
      const { highlights } = pushIfChanged(EMPTY_BOARD_HIGHLIGHTS);
      store.getState().setGuideState({ guidePhase: 'positionUnknown', highlights, pendingGuide: null });
    },
  };
}
