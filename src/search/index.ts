import { cloneSolution, PositionIndex, totalCost, validateSolution } from '../core/solution';
import type { DistanceMatrix } from '../distance';
import type { SearchResult, Solution, Strategy, StrategyName } from '../types';
import { candidateSearch, DEFAULT_CANDIDATE_K } from './candidates';
import type { SearchCtx, SearchOptions, SearchState } from './context';
import { memorySearch } from './memory';
import { steepestDescent } from './steepest';

export type { ProgressFn, SearchOptions, SearchProgress } from './context';
export { DEFAULT_CANDIDATE_K } from './candidates';

const COST_TOLERANCE = 1e-6;

export function parseStrategy(name: string, k = DEFAULT_CANDIDATE_K): Strategy {
  switch (name) {
    case 'steepest':
      return { type: 'steepest' };
    case 'candidates':
      return { type: 'candidates', k };
    case 'memory':
      return { type: 'memory' };
    default:
      throw new Error(`Unknown strategy "${name}"; expected steepest, candidates or memory`);
  }
}

export function strategyLabel(strategy: Strategy): string {
  return strategy.type === 'candidates' ? `candidates(k=${strategy.k})` : strategy.type;
}

function runStrategy(strategy: Strategy, ctx: SearchCtx, state: SearchState): SearchState {
  switch (strategy.type) {
    case 'steepest':
      return steepestDescent(ctx, state);
    case 'candidates':
      return candidateSearch(ctx, state, strategy.k);
    case 'memory':
      return memorySearch(ctx, state);
  }
}

/**
 * Improve a copy of `initial` with the chosen strategy until it reaches a
 * local optimum. `initial` itself is left as it was.
 */
export function runSearch(
  strategy: Strategy,
  initial: Solution,
  matrix: DistanceMatrix,
  opts: SearchOptions = {},
): SearchResult {
  validateSolution(initial, matrix.size);
  if (strategy.type === 'candidates' && (!Number.isInteger(strategy.k) || strategy.k < 1)) {
    throw new Error(`Candidate list size must be a positive integer: ${strategy.k}`);
  }

  const solution = cloneSolution(initial);
  const initialCost = totalCost(matrix, solution);
  const name: StrategyName = strategy.type;
  const ctx: SearchCtx = {
    strategy: name,
    matrix,
    solution,
    index: new PositionIndex(solution),
    verbose: opts.verbose,
    progress: opts.progress,
  };

  const startedAt = performance.now();
  const state = runStrategy(strategy, ctx, { iterations: 0, cost: initialCost });
  const elapsedMs = performance.now() - startedAt;

  const cost = totalCost(matrix, solution);
  if (Math.abs(cost - state.cost) > COST_TOLERANCE) {
    console.warn(
      `${strategyLabel(strategy)}: tracked cost ${state.cost} differs from recomputed cost ${cost}`,
    );
  }

  return {
    strategy,
    solution,
    initialCost,
    cost,
    iterations: state.iterations,
    elapsedMs,
  };
}
