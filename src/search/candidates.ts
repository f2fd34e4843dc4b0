import { bestMove, candidateMoves } from '../core/neighborhood';
import { nearestNeighbors } from '../distance';
import { commitMove, type SearchCtx, type SearchState } from './context';

export const DEFAULT_CANDIDATE_K = 10;

/**
 * Steepest descent restricted to moves that join a city with one of its
 * `k` nearest neighbors. The neighbor table is built once per run.
 */
export function candidateSearch(
  ctx: SearchCtx,
  state: SearchState,
  k = DEFAULT_CANDIDATE_K,
): SearchState {
  const neighbors = nearestNeighbors(ctx.matrix, k);
  for (;;) {
    const move = bestMove(candidateMoves(ctx.matrix, ctx.solution, ctx.index, neighbors));
    if (!move) return state;
    const outcome = commitMove(ctx, state, move);
    if (!outcome.applied) {
      throw new Error(`candidates: freshly generated move was refused (${outcome.reason})`);
    }
  }
}
