import type { DistanceMatrix } from '../distance';
import { InvalidSolutionError } from '../errors';
import type { City, Solution, TourIndex } from '../types';

export const TOUR_INDICES: readonly TourIndex[] = [0, 1];

export function otherTour(t: TourIndex): TourIndex {
  return t === 0 ? 1 : 0;
}

export function emptySolution(): Solution {
  return { tours: [[], []] };
}

export function cloneSolution(solution: Solution): Solution {
  return { tours: [solution.tours[0].slice(), solution.tours[1].slice()] };
}

/** Length of a closed cycle; a two-city tour counts its edge twice. */
export function tourCost(matrix: DistanceMatrix, tour: readonly City[]): number {
  const n = tour.length;
  if (n < 2) return 0;
  let cost = 0;
  for (let i = 0; i < n; i++) {
    cost += matrix.distance(tour[i], tour[(i + 1) % n]);
  }
  return cost;
}

export function totalCost(matrix: DistanceMatrix, solution: Solution): number {
  return tourCost(matrix, solution.tours[0]) + tourCost(matrix, solution.tours[1]);
}

/**
 * Throw unless both tours together hold every city of `0..n-1` exactly once.
 */
export function validateSolution(solution: Solution, n: number): void {
  if (!solution || !Array.isArray(solution.tours) || solution.tours.length !== 2) {
    throw new InvalidSolutionError('expected exactly two tours');
  }
  const seen = new Array<boolean>(n).fill(false);
  const duplicates: City[] = [];
  for (const tour of solution.tours) {
    for (const city of tour) {
      if (!Number.isInteger(city) || city < 0 || city >= n) {
        throw new InvalidSolutionError(`city ${city} is outside 0..${n - 1}`, [city]);
      }
      if (seen[city]) {
        duplicates.push(city);
      }
      seen[city] = true;
    }
  }
  if (duplicates.length > 0) {
    throw new InvalidSolutionError(`cities visited more than once: ${duplicates.join(', ')}`, duplicates);
  }
  const missing: City[] = [];
  seen.forEach((s, city) => {
    if (!s) missing.push(city);
  });
  if (missing.length > 0) {
    throw new InvalidSolutionError(`cities not covered: ${missing.join(', ')}`, missing);
  }
}

export interface Location {
  tour: TourIndex;
  pos: number;
}

/**
 * City -> (tour, position) lookup kept in step with the solution it was
 * built from. Every mutation of the tours must be followed by `reindex`
 * over the touched positions.
 */
export class PositionIndex {
  private readonly tourOf: TourIndex[] = [];
  private readonly posOf: number[] = [];

  constructor(private readonly solution: Solution) {
    for (const t of TOUR_INDICES) {
      this.reindex(t, 0, solution.tours[t].length - 1);
    }
  }

  locate(city: City): Location | undefined {
    const tour = this.tourOf[city];
    if (tour === undefined) return undefined;
    return { tour, pos: this.posOf[city] };
  }

  tourOfCity(city: City): TourIndex | undefined {
    return this.tourOf[city];
  }

  successor(city: City): City | undefined {
    const loc = this.locate(city);
    if (!loc) return undefined;
    const tour = this.solution.tours[loc.tour];
    return tour[(loc.pos + 1) % tour.length];
  }

  predecessor(city: City): City | undefined {
    const loc = this.locate(city);
    if (!loc) return undefined;
    const tour = this.solution.tours[loc.tour];
    return tour[(loc.pos - 1 + tour.length) % tour.length];
  }

  /**
   * +1 when `b` directly follows `a`, -1 when it directly precedes `a`,
   * 0 when the two are not adjacent in one tour. A two-city tour reports +1.
   */
  edgeOrientation(a: City, b: City): 1 | -1 | 0 {
    if (a === b || this.tourOf[a] === undefined || this.tourOf[a] !== this.tourOf[b]) {
      return 0;
    }
    if (this.successor(a) === b) return 1;
    if (this.predecessor(a) === b) return -1;
    return 0;
  }

  /** Refresh positions `from..to` of a tour, walking forward with wraparound. */
  reindex(t: TourIndex, from: number, to: number): void {
    const tour = this.solution.tours[t];
    const n = tour.length;
    if (n === 0) return;
    const span = (((to - from) % n) + n) % n;
    for (let k = 0; k <= span; k++) {
      const pos = (from + k) % n;
      const city = tour[pos];
      this.tourOf[city] = t;
      this.posOf[city] = pos;
    }
  }
}
