export type City = number;

export type Point = readonly [number, number];

/** Ordered cities of one closed cycle; the last city links back to the first. */
export type Tour = City[];

export type TourIndex = 0 | 1;

export interface Solution {
  tours: [Tour, Tour];
}

export type StrategyName = 'steepest' | 'candidates' | 'memory';

export type Strategy =
  | { type: 'steepest' }
  | { type: 'candidates'; k: number }
  | { type: 'memory' };

export type InitKind = 'regret' | 'random';

export interface InstanceConfig {
  strategy?: StrategyName;
  k?: number;
  seed?: number;
  starts?: number;
  init?: InitKind;
  regretWeight?: number;
}

export interface Instance {
  name: string;
  points: Point[];
  config: InstanceConfig;
}

export interface SearchResult {
  strategy: Strategy;
  solution: Solution;
  initialCost: number;
  cost: number;
  iterations: number;
  elapsedMs: number;
}

/** Aggregate of repeated construction + search runs for one strategy. */
export interface ExperimentStats {
  algorithm: string;
  instance: string;
  runs: number;
  minCost: number;
  maxCost: number;
  avgCost: number;
  avgTimeMs: number;
  best: Solution;
}
