import type { PositionIndex } from './solution';
import type { EdgeSwap, Move, NodeSwap } from './moves';
import type { Solution, Tour } from '../types';

export type ApplyFailure = 'crossCycleEdge' | 'staleMove';

export type ApplyOutcome = { applied: true } | { applied: false; reason: ApplyFailure };

const APPLIED: ApplyOutcome = { applied: true };

/**
 * Reverse `tour[from..to]` in place, walking forward from `from` and
 * wrapping past the end of the array.
 */
export function reverseSegment(tour: Tour, from: number, to: number): void {
  const n = tour.length;
  if (n === 0) return;
  const span = (((to - from) % n) + n) % n;
  const swaps = Math.floor((span + 1) / 2);
  for (let k = 0; k < swaps; k++) {
    const i = (from + k) % n;
    const j = (from + span - k) % n;
    const tmp = tour[i];
    tour[i] = tour[j];
    tour[j] = tmp;
  }
}

function applyEdgeSwap(solution: Solution, index: PositionIndex, move: EdgeSwap): ApplyOutcome {
  const locA = index.locate(move.a);
  const locC = index.locate(move.c);
  if (!locA || !locC) return { applied: false, reason: 'staleMove' };
  if (locA.tour !== locC.tour) return { applied: false, reason: 'crossCycleEdge' };

  const tour = solution.tours[locA.tour];
  const n = tour.length;
  const ab = index.edgeOrientation(move.a, move.b);
  const cd = index.edgeOrientation(move.c, move.d);

  let from: number;
  let to: number;
  if (ab === 1 && cd === 1) {
    // a b ... c d  ->  a c ... b d
    from = (locA.pos + 1) % n;
    to = locC.pos;
  } else if (ab === -1 && cd === -1) {
    // b a ... d c  ->  b d ... a c
    const locD = index.locate(move.d);
    if (!locD) return { applied: false, reason: 'staleMove' };
    from = locA.pos;
    to = locD.pos;
  } else {
    return { applied: false, reason: 'staleMove' };
  }

  reverseSegment(tour, from, to);
  index.reindex(locA.tour, from, to);
  return APPLIED;
}

function applyNodeSwap(solution: Solution, index: PositionIndex, move: NodeSwap): ApplyOutcome {
  const loc1 = index.locate(move.y1);
  const loc2 = index.locate(move.y2);
  if (
    !loc1 ||
    !loc2 ||
    move.tour1 === move.tour2 ||
    loc1.tour !== move.tour1 ||
    loc2.tour !== move.tour2
  ) {
    return { applied: false, reason: 'staleMove' };
  }

  solution.tours[move.tour1][loc1.pos] = move.y2;
  solution.tours[move.tour2][loc2.pos] = move.y1;
  index.reindex(move.tour1, loc1.pos, loc1.pos);
  index.reindex(move.tour2, loc2.pos, loc2.pos);
  return APPLIED;
}

/**
 * Apply a move to `solution` in place, re-resolving city positions through
 * `index`. A move that no longer fits the solution is refused and leaves
 * both untouched.
 */
export function applyMove(solution: Solution, index: PositionIndex, move: Move): ApplyOutcome {
  switch (move.kind) {
    case 'edge':
      return applyEdgeSwap(solution, index, move);
    case 'node':
      return applyNodeSwap(solution, index, move);
  }
}
