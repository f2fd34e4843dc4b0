import seedrandom from 'seedrandom';
import { totalCost } from './core/solution';
import type { DistanceMatrix } from './distance';
import type { City, Solution, Tour, TourIndex } from './types';

/** Weight of the best insertion cost against its regret. */
export const DEFAULT_REGRET_WEIGHT = 0.37;

/** Stand-in for the second-best insertion when a tour offers only one. */
const MISSING_SECOND_COST = 1e9;

export interface RegretOptions {
  /** City placed first in tour 0; drawn from `rng` when absent */
  startHint?: City;
  regretWeight?: number;
  rng?: seedrandom.PRNG;
  verbose?: boolean;
}

interface Insertion {
  city: City;
  tour: TourIndex;
  pos: number;
  cost: number;
  weight: number;
}

/** Cost of inserting `city` before position `pos` of `tour`. */
export function insertionCost(matrix: DistanceMatrix, tour: Tour, pos: number, city: City): number {
  const n = tour.length;
  if (n === 0) return 0;
  if (n === 1) return 2 * matrix.distance(tour[0], city);
  const prev = tour[(pos - 1 + n) % n];
  const next = tour[pos % n];
  return matrix.distance(prev, city) + matrix.distance(city, next) - matrix.distance(prev, next);
}

function bestInsertion(
  matrix: DistanceMatrix,
  tour: Tour,
  t: TourIndex,
  city: City,
  regretWeight: number,
): Insertion | undefined {
  if (tour.length === 0) return undefined;
  const slots = tour.length === 1 ? 2 : tour.length;
  let best = Infinity;
  let second = Infinity;
  let bestPos = 0;
  for (let pos = 0; pos < slots; pos++) {
    const cost = insertionCost(matrix, tour, pos, city);
    if (cost < best) {
      second = best;
      best = cost;
      bestPos = pos;
    } else if (cost < second) {
      second = cost;
    }
  }
  if (second === Infinity) second = best + MISSING_SECOND_COST;
  return {
    city,
    tour: t,
    pos: bestPos,
    cost: best,
    weight: second - best - regretWeight * best,
  };
}

/**
 * Weighted 2-regret construction. Tour 0 starts at the hint city, tour 1
 * at the city farthest from it; then the city/tour/position with the
 * highest `regret - regretWeight * bestCost` is inserted until every city
 * is placed.
 */
export function constructRegret(matrix: DistanceMatrix, opts: RegretOptions = {}): Solution {
  const n = matrix.size;
  const regretWeight = opts.regretWeight ?? DEFAULT_REGRET_WEIGHT;
  if (!Number.isFinite(regretWeight)) {
    throw new Error(`Regret weight must be a finite number: ${regretWeight}`);
  }
  if (n === 0) return { tours: [[], []] };

  const rng = opts.rng ?? seedrandom('0');
  const start = opts.startHint ?? Math.floor(rng() * n);
  if (!Number.isInteger(start) || start < 0 || start >= n) {
    throw new Error(`Start city ${start} is outside 0..${n - 1}`);
  }
  if (n === 1) return { tours: [[start], []] };

  const remaining: City[] = [];
  for (let c = 0; c < n; c++) {
    if (c !== start) remaining.push(c);
  }
  let far = remaining[0];
  for (const c of remaining) {
    if (matrix.distance(start, c) > matrix.distance(start, far)) far = c;
  }
  remaining.splice(remaining.indexOf(far), 1);
  const tours: [Tour, Tour] = [[start], [far]];

  while (remaining.length > 0) {
    let choice: Insertion | undefined;
    for (const city of remaining) {
      for (const t of [0, 1] as const) {
        const ins = bestInsertion(matrix, tours[t], t, city, regretWeight);
        if (ins && (!choice || ins.weight > choice.weight)) choice = ins;
      }
    }
    if (!choice) break;
    tours[choice.tour].splice(choice.pos, 0, choice.city);
    remaining.splice(remaining.indexOf(choice.city), 1);
    if (opts.verbose) {
      console.log(`insert ${choice.city} into T${choice.tour} at ${choice.pos}`);
    }
  }

  return { tours };
}

/** Shuffle all cities and split them in half. */
export function randomSolution(n: number, rng: seedrandom.PRNG): Solution {
  const cities = Array.from({ length: n }, (_, i) => i);
  for (let i = cities.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [cities[i], cities[j]] = [cities[j], cities[i]];
  }
  const mid = Math.floor(n / 2);
  return { tours: [cities.slice(0, mid), cities.slice(mid)] };
}

export interface MultiStartOptions {
  starts?: number;
  seed?: number;
  regretWeight?: number;
}

export interface MultiStartResult {
  solution: Solution;
  cost: number;
  start: City | undefined;
}

/**
 * Run the regret construction from several distinct start cities and keep
 * the cheapest result. Attempts share nothing but the read-only matrix.
 */
export function constructBest(matrix: DistanceMatrix, opts: MultiStartOptions = {}): MultiStartResult {
  const n = matrix.size;
  const count = opts.starts ?? 1;
  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Start count must be a positive integer: ${count}`);
  }
  if (opts.regretWeight !== undefined && !Number.isFinite(opts.regretWeight)) {
    throw new Error(`Regret weight must be a finite number: ${opts.regretWeight}`);
  }
  if (n === 0) return { solution: { tours: [[], []] }, cost: 0, start: undefined };

  const rng = seedrandom(String(opts.seed ?? 0));
  const pool = randomSolution(n, rng).tours.flat();
  const starts = pool.slice(0, Math.min(count, n));

  let best: MultiStartResult | undefined;
  for (const start of starts) {
    const solution = constructRegret(matrix, { startHint: start, regretWeight: opts.regretWeight });
    const cost = totalCost(matrix, solution);
    if (!best || cost < best.cost) best = { solution, cost, start };
  }
  if (!best) throw new Error('No construction attempt produced a solution');
  return best;
}
