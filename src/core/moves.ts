import type { DistanceMatrix } from '../distance';
import type { City, Solution, Tour, TourIndex } from '../types';

/** Moves whose delta is not below `-IMPROVEMENT_EPSILON` are not improving. */
export const IMPROVEMENT_EPSILON = 1e-9;

/** Delta reported for a move that cannot be applied; never wins a minimum. */
export const INFEASIBLE_DELTA = Number.POSITIVE_INFINITY;

/**
 * 2-opt exchange inside one tour: edges (a,b) and (c,d) are replaced by
 * (a,c) and (b,d).
 */
export interface EdgeSwap {
  kind: 'edge';
  delta: number;
  a: City;
  b: City;
  c: City;
  d: City;
}

/**
 * Exchange of `y1` (in `tour1`, between `x1` and `z1`) with `y2` (in
 * `tour2`, between `x2` and `z2`).
 */
export interface NodeSwap {
  kind: 'node';
  delta: number;
  tour1: TourIndex;
  tour2: TourIndex;
  x1: City;
  y1: City;
  z1: City;
  x2: City;
  y2: City;
  z2: City;
}

export type Move = EdgeSwap | NodeSwap;

export function isImproving(move: Move): boolean {
  return move.delta < -IMPROVEMENT_EPSILON;
}

export function deltaEdgeSwap(
  matrix: DistanceMatrix,
  a: City,
  b: City,
  c: City,
  d: City,
): number {
  if (a === b || a === c || a === d || b === c || b === d || c === d) {
    return INFEASIBLE_DELTA;
  }
  const D = (i: City, j: City) => matrix.distance(i, j);
  return D(a, c) + D(b, d) - D(a, b) - D(c, d);
}

export function deltaNodeSwap(
  matrix: DistanceMatrix,
  x1: City,
  y1: City,
  z1: City,
  x2: City,
  y2: City,
  z2: City,
): number {
  const D = (i: City, j: City) => matrix.distance(i, j);
  return (
    D(x1, y2) + D(z1, y2) - D(x1, y1) - D(z1, y1) +
    D(x2, y1) + D(z2, y1) - D(x2, y2) - D(z2, y2)
  );
}

/** Edge swap over explicit cities, or `undefined` when they are not four distinct cities. */
export function edgeSwapOf(
  matrix: DistanceMatrix,
  a: City,
  b: City,
  c: City,
  d: City,
): EdgeSwap | undefined {
  const delta = deltaEdgeSwap(matrix, a, b, c, d);
  if (delta === INFEASIBLE_DELTA) return undefined;
  return { kind: 'edge', delta, a, b, c, d };
}

/**
 * 2-opt move over the edges starting at positions `i` and `j` of a tour.
 * Needs four cities and two edges that share no endpoint.
 */
export function makeEdgeSwap(
  matrix: DistanceMatrix,
  tour: Tour,
  i: number,
  j: number,
): EdgeSwap | undefined {
  const n = tour.length;
  if (n < 4) return undefined;
  const lo = Math.min(i, j);
  const hi = Math.max(i, j);
  if (lo < 0 || hi >= n || hi - lo < 2 || (lo === 0 && hi === n - 1)) {
    return undefined;
  }
  return edgeSwapOf(matrix, tour[lo], tour[lo + 1], tour[hi], tour[(hi + 1) % n]);
}

/**
 * Exchange of the city at position `i` of tour `t1` with the city at
 * position `j` of tour `t2`. A singleton tour's only city is its own
 * neighbor on both sides.
 */
export function makeNodeSwap(
  matrix: DistanceMatrix,
  solution: Solution,
  t1: TourIndex,
  i: number,
  t2: TourIndex,
  j: number,
): NodeSwap | undefined {
  const c1 = solution.tours[t1];
  const c2 = solution.tours[t2];
  const n = c1.length;
  const m = c2.length;
  if (n < 1 || m < 1 || i < 0 || i >= n || j < 0 || j >= m) return undefined;

  const y1 = c1[i];
  const x1 = c1[(i - 1 + n) % n];
  const z1 = c1[(i + 1) % n];
  const y2 = c2[j];
  const x2 = c2[(j - 1 + m) % m];
  const z2 = c2[(j + 1) % m];
  const D = (a: City, b: City) => matrix.distance(a, b);

  let delta: number;
  if (n === 1 && m === 1) {
    delta = 0;
  } else if (n === 1) {
    delta = D(x2, y1) + D(y1, z2) - D(x2, y2) - D(y2, z2);
  } else if (m === 1) {
    delta = D(x1, y2) + D(y2, z1) - D(x1, y1) - D(y1, z1);
  } else {
    delta = deltaNodeSwap(matrix, x1, y1, z1, x2, y2, z2);
  }

  return { kind: 'node', delta, tour1: t1, tour2: t2, x1, y1, z1, x2, y2, z2 };
}

/** Identity of a move for de-duplication; equal keys mean equal moves. */
export function moveKey(move: Move): string {
  switch (move.kind) {
    case 'edge': {
      // (a,b,c,d), (c,d,a,b), (b,a,d,c) and (d,c,b,a) remove and add the same
      // edges; the form led by the smallest city is the key
      const { a, b, c, d } = move;
      const low = Math.min(a, b, c, d);
      if (low === a) return `E:${a},${b},${c},${d}`;
      if (low === b) return `E:${b},${a},${d},${c}`;
      if (low === c) return `E:${c},${d},${a},${b}`;
      return `E:${d},${c},${b},${a}`;
    }
    case 'node':
      return `N:${move.tour1},${move.tour2}:${move.x1},${move.y1},${move.z1}:${move.x2},${move.y2},${move.z2}`;
  }
}

export function describeMove(move: Move): string {
  switch (move.kind) {
    case 'edge':
      return `2-opt (${move.a},${move.b})(${move.c},${move.d}) -> (${move.a},${move.c})(${move.b},${move.d}) delta=${move.delta}`;
    case 'node':
      return `swap ${move.y1}@T${move.tour1} <-> ${move.y2}@T${move.tour2} delta=${move.delta}`;
  }
}
