import type { CardId, StackId } from './branded.js';
import { gridPointsEqual, type GridPoint } from './grid-point.js';
import type { MoveCardKind, MoveVector } from './move-card.js';

/**
 * One legal play right now: a card from a stack landing on a destination.
 * Candidates are rebuilt from the game state on every query and compared by
 * `(stackID, cardID, destination)` only.
 */
export interface MoveCandidate {
  readonly stackID: StackId;
  readonly cardID: CardId;
  readonly cardKind: MoveCardKind;
  readonly movementVectors: readonly MoveVector[];
  readonly destination: GridPoint;
  readonly moveVector: MoveVector | null;
}

export function moveCandidatesEqual(a: MoveCandidate, b: MoveCandidate): boolean {
  return a.stackID === b.stackID
    && a.cardID === b.cardID
    && gridPointsEqual(a.destination, b.destination);
}

export function candidatesReaching(
  candidates: readonly MoveCandidate[],
  destination: GridPoint,
): readonly MoveCandidate[] {
  return candidates.filter((candidate) => gridPointsEqual(candidate.destination, destination));
}
