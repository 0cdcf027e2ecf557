import { toGridPointList, type GridPoint, type MoveCandidate } from '@tilewalk/engine/runtime';

import type { GuideBucketKind, GuideHighlightBuckets } from './guide-highlight-buckets.js';

/**
 * Bucket for one card, or `null` for the unrestricted warp kind, which would
 * light up most of the board and is left out of the guide on purpose.
 */
export function classifyMoveCandidate(candidate: MoveCandidate): GuideBucketKind | null {
  switch (candidate.cardKind) {
    case 'superWarp':
      return null;
    case 'fixedWarp':
      return 'warp';
    case 'multiStep':
      return 'multiStep';
    case 'standard':
      return candidate.movementVectors.length > 1 ? 'multipleVector' : 'singleVector';
  }
}

export function classifyMoveCandidates(candidates: readonly MoveCandidate[]): GuideHighlightBuckets {
  const groupedByCard = new Map<string, MoveCandidate[]>();
  for (const candidate of candidates) {
    const group = groupedByCard.get(candidate.cardID);
    if (group === undefined) {
      groupedByCard.set(candidate.cardID, [candidate]);
    } else {
      group.push(candidate);
    }
  }

  const destinations: Record<GuideBucketKind, GridPoint[]> = {
    singleVector: [],
    multipleVector: [],
    multiStep: [],
    warp: [],
  };

  for (const group of groupedByCard.values()) {
    const representative = group[0];
    if (representative === undefined) {
      continue;
    }
    const bucket = classifyMoveCandidate(representative);
    if (bucket === null) {
      continue;
    }
    for (const candidate of group) {
      destinations[bucket].push(candidate.destination);
    }
  }

  return {
    singleVector: toGridPointList(destinations.singleVector),
    multipleVector: toGridPointList(destinations.multipleVector),
    multiStep: toGridPointList(destinations.multiStep),
    warp: toGridPointList(destinations.warp),
  };
}
