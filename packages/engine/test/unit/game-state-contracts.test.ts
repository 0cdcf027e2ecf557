import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  asCardId,
  asStackId,
  collectTopCardIds,
  findHandStack,
  findWarpEffect,
  isPlayablePhase,
  type GamePhase,
  type HandStack,
  type MoveResolution,
} from '../../src/kernel/index.js';

const HAND: readonly HandStack[] = [
  {
    stackID: asStackId('s1'),
    topCard: { id: asCardId('c1'), kind: 'standard', movementVectors: [{ dx: 0, dy: 1 }], displayName: 'Up 1' },
    count: 2,
  },
  { stackID: asStackId('s2'), topCard: null, count: 0 },
];

describe('game phase', () => {
  it('only treats playing as playable', () => {
    const phases: readonly GamePhase[] = ['awaitingStart', 'playing', 'pausedForTransition', 'deadlock', 'cleared'];
    assert.deepEqual(phases.filter((phase) => isPlayablePhase(phase)), ['playing']);
  });
});

describe('hand stacks', () => {
  it('finds stacks by id', () => {
    assert.equal(findHandStack(HAND, asStackId('s2'))?.count, 0);
    assert.equal(findHandStack(HAND, asStackId('missing')), undefined);
  });

  it('collects top card ids and skips empty stacks', () => {
    assert.deepEqual([...collectTopCardIds(HAND)], ['c1']);
  });
});

describe('move resolution', () => {
  const base: MoveResolution = {
    stackID: asStackId('s1'),
    cardID: asCardId('c1'),
    moveVector: { dx: 0, dy: 1 },
    path: [{ x: 0, y: 1 }],
    finalPosition: { x: 0, y: 1 },
    appliedEffects: [],
  };

  it('returns null when no warp was applied', () => {
    assert.equal(findWarpEffect(base), null);
    assert.equal(findWarpEffect({ ...base, appliedEffects: [{ kind: 'slow', point: { x: 0, y: 1 } }] }), null);
  });

  it('returns the first warp effect', () => {
    const resolution: MoveResolution = {
      ...base,
      finalPosition: { x: 4, y: 4 },
      appliedEffects: [
        { kind: 'shuffleHand', point: { x: 0, y: 1 } },
        { kind: 'warp', source: { x: 0, y: 1 }, destination: { x: 4, y: 4 } },
      ],
    };
    assert.deepEqual(findWarpEffect(resolution), {
      kind: 'warp',
      source: { x: 0, y: 1 },
      destination: { x: 4, y: 4 },
    });
  });
});
