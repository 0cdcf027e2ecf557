import { gridPointListsEqual, type GridPoint } from '@tilewalk/engine/runtime';

export type GuideBucketKind = 'singleVector' | 'multipleVector' | 'multiStep' | 'warp';

export const GUIDE_BUCKET_KINDS: readonly GuideBucketKind[] = ['singleVector', 'multipleVector', 'multiStep', 'warp'];

export type GuideHighlightBuckets = Readonly<Record<GuideBucketKind, readonly GridPoint[]>>;

export type HighlightKind = GuideBucketKind | 'forcedSelection';

export type BoardHighlights = Readonly<Record<HighlightKind, readonly GridPoint[]>>;

export const EMPTY_GUIDE_BUCKETS: GuideHighlightBuckets = Object.freeze({
  singleVector: [],
  multipleVector: [],
  multiStep: [],
  warp: [],
});

export const EMPTY_BOARD_HIGHLIGHTS: BoardHighlights = Object.freeze({
  ...EMPTY_GUIDE_BUCKETS,
  forcedSelection: [],
});

export function guideBucketsEqual(a: GuideHighlightBuckets, b: GuideHighlightBuckets): boolean {
  return GUIDE_BUCKET_KINDS.every((kind) => gridPointListsEqual(a[kind], b[kind]));
}

export function boardHighlightsEqual(a: BoardHighlights, b: BoardHighlights): boolean {
  return guideBucketsEqual(a, b) && gridPointListsEqual(a.forcedSelection, b.forcedSelection);
}

export function countGuideCells(buckets: GuideHighlightBuckets): Readonly<Record<GuideBucketKind, number>> {
  return {
    singleVector: buckets.singleVector.length,
    multipleVector: buckets.multipleVector.length,
    multiStep: buckets.multiStep.length,
    warp: buckets.warp.length,
  };
}
