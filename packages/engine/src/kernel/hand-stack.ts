import type { CardId, StackId } from './branded.js';
import type { DealtCard } from './move-card.js';

export interface HandStack {
  readonly stackID: StackId;
  readonly topCard: DealtCard | null;
  readonly count: number;
}

export function findHandStack(hand: readonly HandStack[], stackID: StackId): HandStack | undefined {
  return hand.find((stack) => stack.stackID === stackID);
}

export function collectTopCardIds(hand: readonly HandStack[]): ReadonlySet<CardId> {
  const ids = new Set<CardId>();
  for (const stack of hand) {
    if (stack.topCard !== null) {
      ids.add(stack.topCard.id);
    }
  }
  return ids;
}
