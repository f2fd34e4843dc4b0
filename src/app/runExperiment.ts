import seedrandom from 'seedrandom';
import { constructRegret, randomSolution } from '../construct';
import { buildDistanceMatrix, type DistanceMatrix } from '../distance';
import { DEFAULT_CANDIDATE_K, parseStrategy, runSearch, strategyLabel } from '../search';
import type { ExperimentStats, InitKind, Instance, SearchResult, Solution, StrategyName } from '../types';
import { resolveInstance } from './solveInstance';

export const DEFAULT_EXPERIMENT_RUNS = 10;
const ALL_STRATEGIES: readonly StrategyName[] = ['steepest', 'candidates', 'memory'];

export interface RunExperimentOptions {
  instancePath?: string;
  instance?: Instance;
  runs?: number;
  strategies?: readonly StrategyName[];
  k?: number;
  seed?: number;
  init?: InitKind;
  regretWeight?: number;
  verbose?: boolean;
}

export interface ExperimentReport {
  instance: Instance;
  stats: ExperimentStats[];
}

/** Min, max and average over finished runs, keeping the cheapest solution. */
export function summarizeRuns(
  algorithm: string,
  instance: string,
  results: readonly SearchResult[],
): ExperimentStats {
  if (results.length === 0) {
    throw new Error(`No runs recorded for ${algorithm}`);
  }
  let best = results[0];
  let maxCost = results[0].cost;
  let sumCost = 0;
  let sumTime = 0;
  for (const r of results) {
    if (r.cost < best.cost) best = r;
    maxCost = Math.max(maxCost, r.cost);
    sumCost += r.cost;
    sumTime += r.elapsedMs;
  }
  return {
    algorithm,
    instance,
    runs: results.length,
    minCost: best.cost,
    maxCost,
    avgCost: sumCost / results.length,
    avgTimeMs: sumTime / results.length,
    best: best.solution,
  };
}

function startingSolutions(
  matrix: DistanceMatrix,
  runs: number,
  init: InitKind,
  seed: number,
  regretWeight: number | undefined,
): Solution[] {
  const n = matrix.size;
  const rng = seedrandom(String(seed));
  const out: Solution[] = [];
  if (init === 'random') {
    for (let r = 0; r < runs; r++) out.push(randomSolution(n, rng));
    return out;
  }
  const starts = randomSolution(n, rng).tours.flat();
  for (let r = 0; r < runs; r++) {
    out.push(constructRegret(matrix, { startHint: starts[r % n], regretWeight }));
  }
  return out;
}

/**
 * Run every strategy from the same set of starting solutions and collect
 * cost and time statistics per strategy.
 */
export function runExperiment(opts: RunExperimentOptions): ExperimentReport {
  const instance = resolveInstance(opts);
  const cfg = instance.config;
  const runs = opts.runs ?? DEFAULT_EXPERIMENT_RUNS;
  if (!Number.isInteger(runs) || runs < 1) {
    throw new Error(`Run count must be a positive integer: ${runs}`);
  }
  const k = opts.k ?? cfg.k ?? DEFAULT_CANDIDATE_K;
  const seed = opts.seed ?? cfg.seed ?? 0;
  const init = opts.init ?? cfg.init ?? 'random';

  const matrix = buildDistanceMatrix(instance.points);
  const initials = startingSolutions(
    matrix,
    runs,
    init,
    seed,
    opts.regretWeight ?? cfg.regretWeight,
  );

  const stats: ExperimentStats[] = [];
  for (const name of opts.strategies ?? ALL_STRATEGIES) {
    const strategy = parseStrategy(name, k);
    const label = strategyLabel(strategy);
    if (opts.verbose) console.log(`Running ${label} on ${instance.name} (${runs} runs)`);
    const results = initials.map((initial) => runSearch(strategy, initial, matrix));
    stats.push(summarizeRuns(label, instance.name, results));
  }
  return { instance, stats };
}
