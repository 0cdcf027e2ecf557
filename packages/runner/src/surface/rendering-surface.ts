import type { CardId, GridPoint } from '@tilewalk/engine/runtime';

import type { BoardHighlights } from '../guide/guide-highlight-buckets.js';
import type { ConflictWarning } from '../warning/conflict-warning-channel.js';

export type MoveEffect =
  | { readonly kind: 'warp'; readonly from: GridPoint; readonly to: GridPoint }
  | { readonly kind: 'step'; readonly path: readonly GridPoint[]; readonly to: GridPoint };

/**
 * Passive view the coordinator drives. Nothing here is authoritative state;
 * the surface only mirrors what the store already holds.
 */
export interface RenderingSurface {
  applyHighlights(highlights: BoardHighlights): void;
  setAnimationTarget(cell: GridPoint | null): void;
  hideCard(cardID: CardId): void;
  showCard(cardID: CardId): void;
  conflictWarning(warning: ConflictWarning): void;
  dismissConflictWarning(warningID: number): void;
  moveKnight(cell: GridPoint | null): void;
  syncBoard(): void;
  playMoveEffect(effect: MoveEffect): void;
}

export type HapticPattern = 'success' | 'warning';

export interface HapticFeedback {
  notify(pattern: HapticPattern): void;
}

export interface SessionClockControl {
  pause(): void;
  resume(): void;
}

export const noopHaptics: HapticFeedback = {
  notify(): void {},
};
