import {
  asCardId,
  asStackId,
  offsetGridPoint,
  type DealtCard,
  type GamePhase,
  type GameStatePort,
  type GameStateSignalMap,
  type GameStateSnapshot,
  type GridPoint,
  type HandStack,
  type MoveCandidate,
  type MoveCardKind,
  type MoveResolution,
  type MoveVector,
  type TileEffect,
} from '@tilewalk/engine/runtime';

import { createSignalBus, type SignalBus } from '../../src/bridge/signal-bus.js';

export interface FakeStack {
  readonly stackID: string;
  readonly cards: readonly DealtCard[];
}

export interface FakeGameOptions {
  readonly width?: number;
  readonly height?: number;
  readonly blocked?: readonly GridPoint[];
  readonly stacks?: readonly FakeStack[];
  readonly nextCards?: readonly DealtCard[];
  readonly current?: GridPoint | null;
  readonly phase?: GamePhase;
  readonly warpTarget?: GridPoint;
  readonly warpTiles?: readonly { readonly source: GridPoint; readonly destination: GridPoint }[];
}

export interface FakeGame extends GameStatePort {
  readonly bus: SignalBus<GameStateSignalMap>;
  readonly playedMoves: readonly MoveCandidate[];
  setStacks(stacks: readonly FakeStack[], nextCards?: readonly DealtCard[]): void;
  setPosition(current: GridPoint | null): void;
  setPhase(phase: GamePhase): void;
  emitBoardChanged(): void;
}

export function card(id: string, kind: MoveCardKind, movementVectors: readonly MoveVector[]): DealtCard {
  return { id: asCardId(id), kind, movementVectors, displayName: id };
}

export const singleVectorCard = (id: string, dx: number, dy: number): DealtCard =>
  card(id, 'standard', [{ dx, dy }]);

export const multiVectorCard = (id: string, vectors: readonly MoveVector[]): DealtCard =>
  card(id, 'standard', vectors);

export function stack(stackID: string, ...cards: readonly DealtCard[]): FakeStack {
  return { stackID, cards };
}

/**
 * In-process game with a rectangular board. Standard and multi-step cards
 * move by each of their vectors from the current cell; fixed warps land on
 * `warpTarget`; the unrestricted warp reaches every traversable cell.
 */
export function createFakeGame(options: FakeGameOptions = {}): FakeGame {
  const width = options.width ?? 5;
  const height = options.height ?? 5;
  const blocked = new Set((options.blocked ?? []).map((point) => `${point.x},${point.y}`));
  const bus = createSignalBus<GameStateSignalMap>();
  const playedMoves: MoveCandidate[] = [];

  let stacks: FakeStack[] = [...(options.stacks ?? [])];
  let nextCards: readonly DealtCard[] = options.nextCards ?? [];
  let current: GridPoint | null = options.current === undefined ? { x: 0, y: 0 } : options.current;
  let phase: GamePhase = options.phase ?? 'playing';
  let lastResolution: MoveResolution | null = null;

  const isTraversable = (cell: GridPoint): boolean =>
    cell.x >= 0 && cell.y >= 0 && cell.x < width && cell.y < height && !blocked.has(`${cell.x},${cell.y}`);

  const toHand = (source: readonly FakeStack[]): readonly HandStack[] =>
    source.map((entry) => ({
      stackID: asStackId(entry.stackID),
      topCard: entry.cards[0] ?? null,
      count: entry.cards.length,
    }));

  const destinationsFor = (topCard: DealtCard, origin: GridPoint): readonly {
    readonly destination: GridPoint;
    readonly moveVector: MoveVector | null;
  }[] => {
    switch (topCard.kind) {
      case 'standard':
      case 'multiStep':
        return topCard.movementVectors
          .map((vector) => ({ destination: offsetGridPoint(origin, vector.dx, vector.dy), moveVector: vector }))
          .filter((entry) => isTraversable(entry.destination));
      case 'fixedWarp':
        return options.warpTarget !== undefined && isTraversable(options.warpTarget)
          ? [{ destination: options.warpTarget, moveVector: null }]
          : [];
      case 'superWarp': {
        const cells: { destination: GridPoint; moveVector: MoveVector | null }[] = [];
        for (let y = 0; y < height; y += 1) {
          for (let x = 0; x < width; x += 1) {
            const destination = { x, y };
            if (isTraversable(destination) && (x !== origin.x || y !== origin.y)) {
              cells.push({ destination, moveVector: null });
            }
          }
        }
        return cells;
      }
    }
  };

  const availableMoves = (handOverride?: readonly HandStack[], currentOverride?: GridPoint): readonly MoveCandidate[] => {
    const origin = currentOverride ?? current;
    if (origin === null) {
      return [];
    }
    const candidates: MoveCandidate[] = [];
    for (const entry of handOverride ?? toHand(stacks)) {
      if (entry.topCard === null) {
        continue;
      }
      for (const { destination, moveVector } of destinationsFor(entry.topCard, origin)) {
        candidates.push({
          stackID: entry.stackID,
          cardID: entry.topCard.id,
          cardKind: entry.topCard.kind,
          movementVectors: entry.topCard.movementVectors,
          destination,
          moveVector,
        });
      }
    }
    return candidates;
  };

  const snapshot = (): GameStateSnapshot => ({
    hand: toHand(stacks),
    nextCards,
    current,
    phase,
    lastResolution,
  });

  const emitHand = (): void => {
    bus.emit('handChanged', { hand: toHand(stacks), nextCards });
  };

  return {
    bus,
    playedMoves,
    getSnapshot: snapshot,
    isTraversable,
    availableMoves,

    playMove(candidate): void {
      playedMoves.push(candidate);
      stacks = stacks
        .map((entry) => (entry.stackID === candidate.stackID ? { ...entry, cards: entry.cards.slice(1) } : entry))
        .filter((entry) => entry.cards.length > 0);

      const warp = (options.warpTiles ?? []).find(
        (tile) => tile.source.x === candidate.destination.x && tile.source.y === candidate.destination.y,
      );
      const appliedEffects: TileEffect[] = warp === undefined
        ? []
        : [{ kind: 'warp', source: warp.source, destination: warp.destination }];
      const finalPosition = warp === undefined ? candidate.destination : warp.destination;

      current = finalPosition;
      lastResolution = {
        stackID: candidate.stackID,
        cardID: candidate.cardID,
        moveVector: candidate.moveVector,
        path: [candidate.destination],
        finalPosition,
        appliedEffects,
      };

      emitHand();
      bus.emit('positionChanged', { current });
      bus.emit('moveResolved', { resolution: lastResolution });
    },

    subscribe(signal, listener) {
      return bus.subscribe(signal, listener);
    },

    setStacks(next, nextPreview): void {
      stacks = [...next];
      if (nextPreview !== undefined) {
        nextCards = nextPreview;
      }
      emitHand();
    },

    setPosition(next): void {
      current = next;
      bus.emit('positionChanged', { current });
    },

    setPhase(next): void {
      phase = next;
      bus.emit('phaseChanged', { phase });
    },

    emitBoardChanged(): void {
      bus.emit('boardChanged', {});
    },
  };
}
