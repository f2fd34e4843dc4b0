import seedrandom from 'seedrandom';
import { constructBest, randomSolution } from '../construct';
import { buildDistanceMatrix, type DistanceMatrix } from '../distance';
import { emitResult, type EmitResult } from '../io/emit';
import { loadInstance } from '../io/parse';
import {
  DEFAULT_CANDIDATE_K,
  parseStrategy,
  runSearch,
  strategyLabel,
  type ProgressFn,
} from '../search';
import { formatElapsed } from '../time';
import type { InitKind, Instance, SearchResult, Solution, StrategyName } from '../types';

export interface SolveInstanceOptions {
  instancePath?: string;
  /** Already loaded instance; takes precedence over `instancePath` */
  instance?: Instance;
  strategy?: StrategyName;
  k?: number;
  seed?: number;
  starts?: number;
  init?: InitKind;
  regretWeight?: number;
  markdown?: boolean;
  verbose?: boolean;
  progress?: ProgressFn;
}

export interface SolveInstanceResult extends EmitResult {
  instance: Instance;
  matrix: DistanceMatrix;
  result: SearchResult;
}

export function resolveInstance(opts: { instance?: Instance; instancePath?: string }): Instance {
  if (opts.instance) return opts.instance;
  if (!opts.instancePath) {
    throw new Error('An instance or instance path is required');
  }
  return loadInstance(opts.instancePath);
}

export interface InitialSolutionOptions {
  init: InitKind;
  seed: number;
  starts?: number;
  regretWeight?: number;
}

export function initialSolution(matrix: DistanceMatrix, opts: InitialSolutionOptions): Solution {
  if (opts.init === 'random') {
    return randomSolution(matrix.size, seedrandom(String(opts.seed)));
  }
  return constructBest(matrix, {
    starts: opts.starts,
    seed: opts.seed,
    regretWeight: opts.regretWeight,
  }).solution;
}

/** Load, construct, improve and summarize one instance. */
export function solveInstance(opts: SolveInstanceOptions): SolveInstanceResult {
  const instance = resolveInstance(opts);
  const cfg = instance.config;
  const strategyName = opts.strategy ?? cfg.strategy ?? 'memory';
  const k = opts.k ?? cfg.k ?? DEFAULT_CANDIDATE_K;
  const seed = opts.seed ?? cfg.seed ?? 0;
  const init = opts.init ?? cfg.init ?? 'regret';

  const matrix = buildDistanceMatrix(instance.points);
  const initial = initialSolution(matrix, {
    init,
    seed,
    starts: opts.starts ?? cfg.starts,
    regretWeight: opts.regretWeight ?? cfg.regretWeight,
  });
  const result = runSearch(parseStrategy(strategyName, k), initial, matrix, {
    verbose: opts.verbose,
    progress: opts.progress,
  });

  const runTimestamp = new Date().toISOString();
  const emit = emitResult(instance, result, runTimestamp, { seed, markdown: opts.markdown });
  const [t0, t1] = result.solution.tours;
  const summaryParts = [
    `Instance ${instance.name}`,
    `strategy=${strategyLabel(result.strategy)}`,
    `init=${init}`,
    `cost=${result.initialCost} -> ${result.cost}`,
    `iterations=${result.iterations}`,
    `tours=${t0.length}/${t1.length}`,
    `time=${formatElapsed(result.elapsedMs)}`,
  ];
  console.log(summaryParts.join(' | '));
  return { ...emit, instance, matrix, result };
}
