import { bestMove, improvingMoves } from '../core/neighborhood';
import { commitMove, type SearchCtx, type SearchState } from './context';

/**
 * Steepest descent over the full neighborhood: every iteration enumerates
 * all edge and node swaps and applies the single best one, until none
 * improves.
 */
export function steepestDescent(ctx: SearchCtx, state: SearchState): SearchState {
  for (;;) {
    const move = bestMove(improvingMoves(ctx.matrix, ctx.solution));
    if (!move) return state;
    const outcome = commitMove(ctx, state, move);
    if (!outcome.applied) {
      throw new Error(`steepest: freshly generated move was refused (${outcome.reason})`);
    }
  }
}
