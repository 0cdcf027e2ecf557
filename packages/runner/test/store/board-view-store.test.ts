import { asCardId, asStackId } from '@tilewalk/engine/runtime';
import { describe, expect, it, vi } from 'vitest';

import { EMPTY_BOARD_HIGHLIGHTS } from '../../src/guide/guide-highlight-buckets.js';
import { createBoardViewStore } from '../../src/store/board-view-store.js';

describe('createBoardViewStore', () => {
  it('starts from the given preferences with empty view state', () => {
    const store = createBoardViewStore({ guideEnabled: false, hapticsEnabled: true });
    const state = store.getState();

    expect(state.guideEnabled).toBe(false);
    expect(state.hapticsEnabled).toBe(true);
    expect(state.guidePhase).toBe('positionUnknown');
    expect(state.highlights).toEqual(EMPTY_BOARD_HIGHLIGHTS);
    expect(state.animationSession).toBeNull();
    expect(state.hiddenCardIDs.size).toBe(0);
    expect(state.suspensionReasons).toEqual([]);
  });

  it('keeps the existing top-card map when only hidden cards change', () => {
    const store = createBoardViewStore({ guideEnabled: true, hapticsEnabled: true });
    const topCards = new Map([[asStackId('s1'), asCardId('c1')]]);
    store.getState().setHiddenCards({ hiddenCardIDs: new Set(), topCardIDsByStack: topCards });

    store.getState().setHiddenCards({ hiddenCardIDs: new Set([asCardId('c1')]) });

    expect(store.getState().topCardIDsByStack).toBe(topCards);
    expect([...store.getState().hiddenCardIDs]).toEqual(['c1']);
  });

  it('notifies selector subscribers only when the selected slice changes', () => {
    const store = createBoardViewStore({ guideEnabled: true, hapticsEnabled: true });
    const listener = vi.fn();
    store.subscribe((state) => state.selectedCard, listener);

    store.getState().setHapticsEnabled(false);
    store.getState().setSelectedCard({ stackID: asStackId('s1'), cardID: asCardId('c1') });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0]?.[0]).toEqual({ stackID: 's1', cardID: 'c1' });
  });

  it('resets view state but keeps the preferences', () => {
    const store = createBoardViewStore({ guideEnabled: true, hapticsEnabled: true });
    store.getState().setGuideEnabled(false);
    store.getState().setSuspensionReasons(['menuOpen']);
    store.getState().setAnimationState({ animationSession: null, animationTarget: { x: 1, y: 1 } });

    store.getState().resetBoardView();

    expect(store.getState().guideEnabled).toBe(false);
    expect(store.getState().suspensionReasons).toEqual([]);
    expect(store.getState().animationTarget).toBeNull();
  });
});
