import { describe, it, expect } from 'vitest';
import { applyMove, reverseSegment } from '../src/core/applyMove';
import { makeEdgeSwap, makeNodeSwap, type EdgeSwap } from '../src/core/moves';
import { PositionIndex, totalCost } from '../src/core/solution';
import { buildDistanceMatrix } from '../src/distance';
import type { Solution } from '../src/types';

const square = buildDistanceMatrix([
  [0, 0],
  [0, 10],
  [10, 10],
  [10, 0],
]);

// edges (0,2) and (1,3) replaced by (0,1) and (2,3)
const uncross: EdgeSwap = { kind: 'edge', delta: -8, a: 0, b: 2, c: 1, d: 3 };

function single(tour: number[]): Solution {
  return { tours: [tour, []] };
}

describe('reverseSegment', () => {
  it('reverses an inner range', () => {
    const tour = [0, 1, 2, 3, 4, 5];
    reverseSegment(tour, 1, 3);
    expect(tour).toEqual([0, 3, 2, 1, 4, 5]);
  });

  it('wraps past the end of the array', () => {
    const tour = [0, 1, 2, 3, 4, 5];
    reverseSegment(tour, 4, 1);
    expect(tour).toEqual([5, 4, 2, 3, 1, 0]);
  });
});

describe('applyMove', () => {
  it('applies a 2-opt move on forward edges', () => {
    const solution = single([0, 2, 1, 3]);
    const index = new PositionIndex(solution);
    const move = makeEdgeSwap(square, solution.tours[0], 0, 2);
    expect(move).toBeDefined();
    if (!move) return;
    const before = totalCost(square, solution);
    expect(applyMove(solution, index, move)).toEqual({ applied: true });
    expect(solution.tours[0]).toEqual([0, 1, 2, 3]);
    expect(totalCost(square, solution) - before).toBe(move.delta);
    expect(index.locate(1)).toEqual({ tour: 0, pos: 1 });
  });

  it('applies a 2-opt move whose edges both run backwards', () => {
    const solution = single([3, 1, 2, 0]);
    const index = new PositionIndex(solution);
    expect(applyMove(solution, index, uncross)).toEqual({ applied: true });
    expect(solution.tours[0]).toEqual([0, 1, 2, 3]);
    expect(totalCost(square, solution)).toBe(40);
  });

  it('refuses edges running in opposite directions', () => {
    const solution = single([0, 2, 3, 1]);
    const index = new PositionIndex(solution);
    expect(applyMove(solution, index, uncross)).toEqual({ applied: false, reason: 'staleMove' });
    expect(solution.tours[0]).toEqual([0, 2, 3, 1]);
  });

  it('refuses an edge that no longer exists', () => {
    const solution = single([0, 1, 2, 3]);
    const index = new PositionIndex(solution);
    expect(applyMove(solution, index, uncross)).toEqual({ applied: false, reason: 'staleMove' });
  });

  it('refuses edges from different tours', () => {
    const solution: Solution = { tours: [[0, 2], [1, 3]] };
    const index = new PositionIndex(solution);
    expect(applyMove(solution, index, uncross)).toEqual({
      applied: false,
      reason: 'crossCycleEdge',
    });
    expect(solution.tours).toEqual([[0, 2], [1, 3]]);
  });

  it('exchanges cities between tours and refuses the same swap twice', () => {
    const solution: Solution = { tours: [[0, 2], [1, 3]] };
    const index = new PositionIndex(solution);
    const move = makeNodeSwap(square, solution, 0, 0, 1, 0);
    expect(move).toBeDefined();
    if (!move) return;
    expect(applyMove(solution, index, move)).toEqual({ applied: true });
    expect(solution.tours).toEqual([[1, 2], [0, 3]]);
    expect(index.locate(0)).toEqual({ tour: 1, pos: 0 });
    expect(totalCost(square, solution)).toBe(40);
    expect(applyMove(solution, index, move)).toEqual({ applied: false, reason: 'staleMove' });
  });
});
