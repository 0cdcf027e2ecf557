import type { CardId } from './branded.js';

export interface MoveVector {
  readonly dx: number;
  readonly dy: number;
}

/**
 * - `standard`: moves by exactly one of its movement vectors.
 * - `multiStep`: slides along a vector through intermediate cells.
 * - `fixedWarp`: jumps to a fixed special destination.
 * - `superWarp`: may land on effectively any traversable cell.
 */
export type MoveCardKind = 'standard' | 'multiStep' | 'fixedWarp' | 'superWarp';

export interface DealtCard {
  readonly id: CardId;
  readonly kind: MoveCardKind;
  readonly movementVectors: readonly MoveVector[];
  readonly displayName: string;
}
