import type { CardId, GridPoint, HandStack, StackId } from '@tilewalk/engine/runtime';
import { subscribeWithSelector } from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';

import type { AnimationSession } from '../animation/animation-session.js';
import {
  EMPTY_BOARD_HIGHLIGHTS,
  type BoardHighlights,
  type GuideHighlightBuckets,
} from '../guide/guide-highlight-buckets.js';
import type { SuspensionReason } from '../timer/timer-suspension-coordinator.js';
import type { ConflictWarning } from '../warning/conflict-warning-channel.js';

export type GuidePhase = 'positionUnknown' | 'guideDisabled' | 'pausedPhase' | 'playablePhase';

export interface PendingGuideSnapshot {
  readonly hand: readonly HandStack[];
  readonly current: GridPoint | null;
  /** `null` while the position is unknown: nothing could be computed yet. */
  readonly buckets: GuideHighlightBuckets | null;
}

export interface SelectedCard {
  readonly stackID: StackId;
  readonly cardID: CardId;
}

interface BoardViewStoreState {
  readonly guideEnabled: boolean;
  readonly hapticsEnabled: boolean;
  readonly guidePhase: GuidePhase;
  readonly highlights: BoardHighlights;
  readonly pendingGuide: PendingGuideSnapshot | null;
  readonly animationSession: AnimationSession | null;
  readonly animationTarget: GridPoint | null;
  readonly hiddenCardIDs: ReadonlySet<CardId>;
  readonly topCardIDsByStack: ReadonlyMap<StackId, CardId>;
  readonly selectedCard: SelectedCard | null;
  readonly conflictWarning: ConflictWarning | null;
  readonly suspensionReasons: readonly SuspensionReason[];
}

interface BoardViewStoreActions {
  setGuideEnabled(enabled: boolean): void;
  setHapticsEnabled(enabled: boolean): void;
  setGuideState(next: {
    readonly guidePhase: GuidePhase;
    readonly highlights: BoardHighlights;
    readonly pendingGuide: PendingGuideSnapshot | null;
  }): void;
  setHighlights(highlights: BoardHighlights): void;
  setAnimationState(next: {
    readonly animationSession: AnimationSession | null;
    readonly animationTarget: GridPoint | null;
  }): void;
  setHiddenCards(next: {
    readonly hiddenCardIDs: ReadonlySet<CardId>;
    readonly topCardIDsByStack?: ReadonlyMap<StackId, CardId>;
  }): void;
  setSelectedCard(selectedCard: SelectedCard | null): void;
  setConflictWarning(warning: ConflictWarning | null): void;
  setSuspensionReasons(reasons: readonly SuspensionReason[]): void;
  resetBoardView(): void;
}

export type BoardViewStore = BoardViewStoreState & BoardViewStoreActions;

export interface BoardViewStoreOptions {
  readonly guideEnabled: boolean;
  readonly hapticsEnabled: boolean;
}

const EMPTY_CARD_IDS: ReadonlySet<CardId> = new Set();
const EMPTY_TOP_CARDS: ReadonlyMap<StackId, CardId> = new Map();

function initialTransientState(): Omit<BoardViewStoreState, 'guideEnabled' | 'hapticsEnabled'> {
  return {
    guidePhase: 'positionUnknown',
    highlights: EMPTY_BOARD_HIGHLIGHTS,
    pendingGuide: null,
    animationSession: null,
    animationTarget: null,
    hiddenCardIDs: EMPTY_CARD_IDS,
    topCardIDsByStack: EMPTY_TOP_CARDS,
    selectedCard: null,
    conflictWarning: null,
    suspensionReasons: [],
  };
}

export function createBoardViewStore(options: BoardViewStoreOptions) {
  return createStore<BoardViewStore>()(subscribeWithSelector((set) => ({
    guideEnabled: options.guideEnabled,
    hapticsEnabled: options.hapticsEnabled,
    ...initialTransientState(),

    setGuideEnabled(enabled) {
      set({ guideEnabled: enabled });
    },

    setHapticsEnabled(enabled) {
      set({ hapticsEnabled: enabled });
    },

    setGuideState(next) {
      set({
        guidePhase: next.guidePhase,
        highlights: next.highlights,
        pendingGuide: next.pendingGuide,
      });
    },

    setHighlights(highlights) {
      set({ highlights });
    },

    setAnimationState(next) {
      set({
        animationSession: next.animationSession,
        animationTarget: next.animationTarget,
      });
    },

    setHiddenCards(next) {
      set(next.topCardIDsByStack === undefined
        ? { hiddenCardIDs: next.hiddenCardIDs }
        : { hiddenCardIDs: next.hiddenCardIDs, topCardIDsByStack: next.topCardIDsByStack });
    },

    setSelectedCard(selectedCard) {
      set({ selectedCard });
    },

    setConflictWarning(conflictWarning) {
      set({ conflictWarning });
    },

    setSuspensionReasons(reasons) {
      set({ suspensionReasons: [...reasons] });
    },

    resetBoardView() {
      set(initialTransientState());
    },
  })));
}

export type BoardViewStoreApi = ReturnType<typeof createBoardViewStore>;
