import type { GamePhase } from './game-phase.js';
import type { GridPoint } from './grid-point.js';
import type { HandStack } from './hand-stack.js';
import type { DealtCard } from './move-card.js';
import type { MoveCandidate } from './move-candidate.js';
import type { MoveResolution } from './move-resolution.js';

export interface GameStateSnapshot {
  readonly hand: readonly HandStack[];
  readonly nextCards: readonly DealtCard[];
  readonly current: GridPoint | null;
  readonly phase: GamePhase;
  readonly lastResolution: MoveResolution | null;
}

export interface GameStateSignalMap {
  readonly handChanged: { readonly hand: readonly HandStack[]; readonly nextCards: readonly DealtCard[] };
  readonly boardChanged: Readonly<Record<string, never>>;
  readonly positionChanged: { readonly current: GridPoint | null };
  readonly phaseChanged: { readonly phase: GamePhase };
  readonly moveResolved: { readonly resolution: MoveResolution };
}

export type GameStateSignal = keyof GameStateSignalMap;

/**
 * Read and write surface of the game object that owns the rules. Listeners
 * are called synchronously, in subscription order, on the caller's stack.
 */
export interface GameStatePort {
  getSnapshot(): GameStateSnapshot;
  isTraversable(cell: GridPoint): boolean;
  availableMoves(handOverride?: readonly HandStack[], currentOverride?: GridPoint): readonly MoveCandidate[];
  playMove(candidate: MoveCandidate): void;
  subscribe<K extends GameStateSignal>(
    signal: K,
    listener: (payload: GameStateSignalMap[K]) => void,
  ): () => void;
}
