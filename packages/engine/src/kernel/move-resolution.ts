import type { CardId, StackId } from './branded.js';
import type { GridPoint } from './grid-point.js';
import type { MoveVector } from './move-card.js';

export type TileEffect =
  | { readonly kind: 'warp'; readonly source: GridPoint; readonly destination: GridPoint }
  | { readonly kind: 'shuffleHand'; readonly point: GridPoint }
  | { readonly kind: 'slow'; readonly point: GridPoint };

export interface MoveResolution {
  readonly stackID: StackId;
  readonly cardID: CardId;
  readonly moveVector: MoveVector | null;
  /** Cells visited in order, excluding the starting cell. */
  readonly path: readonly GridPoint[];
  readonly finalPosition: GridPoint;
  readonly appliedEffects: readonly TileEffect[];
}

export type WarpEffect = Extract<TileEffect, { kind: 'warp' }>;

export function findWarpEffect(resolution: MoveResolution): WarpEffect | null {
  for (const effect of resolution.appliedEffects) {
    if (effect.kind === 'warp') {
      return effect;
    }
  }
  return null;
}
