import { applyMove, type ApplyOutcome } from '../core/applyMove';
import { describeMove, type Move } from '../core/moves';
import type { PositionIndex } from '../core/solution';
import type { DistanceMatrix } from '../distance';
import type { Solution, StrategyName } from '../types';

export interface SearchProgress {
  strategy: StrategyName;
  iteration: number;
  cost: number;
  move: Move;
}

export type ProgressFn = (event: SearchProgress) => void;

export interface SearchOptions {
  /** Log every applied or refused move */
  verbose?: boolean;
  progress?: ProgressFn;
}

export interface SearchCtx extends SearchOptions {
  strategy: StrategyName;
  matrix: DistanceMatrix;
  solution: Solution;
  index: PositionIndex;
}

export interface SearchState {
  iterations: number;
  cost: number;
}

/**
 * Apply `move` and account for it: bump the iteration count, add its delta
 * to the running cost and report progress. Refused moves change nothing.
 */
export function commitMove(ctx: SearchCtx, state: SearchState, move: Move): ApplyOutcome {
  const outcome = applyMove(ctx.solution, ctx.index, move);
  if (!outcome.applied) {
    if (ctx.verbose) {
      console.log(`${ctx.strategy}: skip ${describeMove(move)} (${outcome.reason})`);
    }
    return outcome;
  }
  state.iterations += 1;
  state.cost += move.delta;
  if (ctx.verbose) {
    console.log(`${ctx.strategy}: #${state.iterations} ${describeMove(move)} cost=${state.cost}`);
  }
  ctx.progress?.({
    strategy: ctx.strategy,
    iteration: state.iterations,
    cost: state.cost,
    move,
  });
  return outcome;
}
