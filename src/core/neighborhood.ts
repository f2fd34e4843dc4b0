import type { DistanceMatrix } from '../distance';
import type { City, Solution, Tour } from '../types';
import {
  edgeSwapOf,
  isImproving,
  makeEdgeSwap,
  makeNodeSwap,
  moveKey,
  type EdgeSwap,
  type Move,
  type NodeSwap,
} from './moves';
import { otherTour, TOUR_INDICES, type PositionIndex } from './solution';

/**
 * Every 2-opt move of a tour: each unordered pair of edges sharing no
 * endpoint. Tours below four cities have none.
 */
export function generateEdgeSwaps(matrix: DistanceMatrix, tour: Tour): EdgeSwap[] {
  const n = tour.length;
  const moves: EdgeSwap[] = [];
  if (n < 4) return moves;
  for (let i = 0; i < n; i++) {
    for (let j = i + 2; j < n; j++) {
      if (i === 0 && j === n - 1) continue;
      const m = makeEdgeSwap(matrix, tour, i, j);
      if (m) moves.push(m);
    }
  }
  return moves;
}

/** Every exchange of a city of tour 0 with a city of tour 1. */
export function generateNodeSwaps(matrix: DistanceMatrix, solution: Solution): NodeSwap[] {
  const moves: NodeSwap[] = [];
  const n = solution.tours[0].length;
  const m = solution.tours[1].length;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < m; j++) {
      const move = makeNodeSwap(matrix, solution, 0, i, 1, j);
      if (move) moves.push(move);
    }
  }
  return moves;
}

/** Full neighborhood of a solution, restricted to improving moves. */
export function improvingMoves(matrix: DistanceMatrix, solution: Solution): Move[] {
  const moves: Move[] = [];
  for (const t of TOUR_INDICES) {
    for (const m of generateEdgeSwaps(matrix, solution.tours[t])) {
      if (isImproving(m)) moves.push(m);
    }
  }
  for (const m of generateNodeSwaps(matrix, solution)) {
    if (isImproving(m)) moves.push(m);
  }
  return moves;
}

/** Lowest-delta improving move; the earliest one wins ties. */
export function bestMove(moves: Iterable<Move>): Move | undefined {
  let best: Move | undefined;
  for (const m of moves) {
    if (!isImproving(m)) continue;
    if (!best || m.delta < best.delta) best = m;
  }
  return best;
}

function nodeSwapBetween(
  matrix: DistanceMatrix,
  solution: Solution,
  index: PositionIndex,
  u: City,
  v: City,
): NodeSwap | undefined {
  const lu = index.locate(u);
  const lv = index.locate(v);
  if (!lu || !lv || lu.tour === lv.tour) return undefined;
  return lu.tour === 0
    ? makeNodeSwap(matrix, solution, 0, lu.pos, 1, lv.pos)
    : makeNodeSwap(matrix, solution, 0, lv.pos, 1, lu.pos);
}

/**
 * Improving moves that bring each city next to one of its nearest
 * neighbors: the two 2-opt moves creating edge (a,b) when both share a
 * tour, the exchange of `a` and `b` otherwise.
 */
export function candidateMoves(
  matrix: DistanceMatrix,
  solution: Solution,
  index: PositionIndex,
  neighbors: readonly (readonly City[])[],
): Move[] {
  const moves: Move[] = [];
  for (let a = 0; a < neighbors.length; a++) {
    const ta = index.tourOfCity(a);
    if (ta === undefined) continue;
    for (const b of neighbors[a]) {
      const tb = index.tourOfCity(b);
      if (tb === undefined) continue;
      if (ta !== tb) {
        const m = nodeSwapBetween(matrix, solution, index, a, b);
        if (m && isImproving(m)) moves.push(m);
        continue;
      }
      if (solution.tours[ta].length < 4) continue;
      const aNext = index.successor(a);
      const aPrev = index.predecessor(a);
      const bNext = index.successor(b);
      const bPrev = index.predecessor(b);
      if (aNext === undefined || aPrev === undefined || bNext === undefined || bPrev === undefined) {
        continue;
      }
      const forward = edgeSwapOf(matrix, a, aNext, b, bNext);
      if (forward && isImproving(forward)) moves.push(forward);
      const backward = edgeSwapOf(matrix, aPrev, a, bPrev, b);
      if (backward && isImproving(backward)) moves.push(backward);
    }
  }
  return moves;
}

/**
 * Improving moves touching any of `cities`: 2-opt moves pairing an edge
 * incident to the city with every other edge of its tour, and exchanges of
 * the city with every city of the other tour.
 */
export function movesAroundCities(
  matrix: DistanceMatrix,
  solution: Solution,
  index: PositionIndex,
  cities: Iterable<City>,
): Move[] {
  const found = new Map<string, Move>();
  const keep = (m: Move | undefined) => {
    if (m && isImproving(m)) found.set(moveKey(m), m);
  };

  for (const u of cities) {
    const loc = index.locate(u);
    if (!loc) continue;
    const tour = solution.tours[loc.tour];
    const n = tour.length;

    if (n >= 4) {
      const prev = tour[(loc.pos - 1 + n) % n];
      const next = tour[(loc.pos + 1) % n];
      for (let k = 0; k < n; k++) {
        const p = tour[k];
        const q = tour[(k + 1) % n];
        keep(edgeSwapOf(matrix, prev, u, p, q));
        keep(edgeSwapOf(matrix, u, next, p, q));
      }
    }

    const other = solution.tours[otherTour(loc.tour)];
    for (const v of other) {
      keep(nodeSwapBetween(matrix, solution, index, u, v));
    }
  }

  return Array.from(found.values());
}
