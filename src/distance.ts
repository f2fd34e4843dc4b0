import { InvalidInstanceError } from './errors';
import type { City, Point } from './types';

/** Read-only symmetric cost lookup over cities `0..size-1`. */
export interface DistanceMatrix {
  readonly size: number;
  distance(i: City, j: City): number;
}

class TableMatrix implements DistanceMatrix {
  constructor(private readonly rows: readonly (readonly number[])[]) {}

  get size(): number {
    return this.rows.length;
  }

  distance(i: City, j: City): number {
    return this.rows[i][j];
  }
}

/** Euclidean distance rounded to the nearest integer. */
export function euclideanRounded(a: Point, b: Point): number {
  return Math.round(Math.hypot(a[0] - b[0], a[1] - b[1]));
}

/**
 * Build a symmetric distance matrix for the provided points.
 * Only the upper triangle (j > i) is computed and mirrored to the lower triangle.
 */
export function buildDistanceMatrix(points: readonly Point[]): DistanceMatrix {
  const n = points.length;
  const rows: number[][] = Array.from({ length: n }, () => Array<number>(n).fill(0));

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const dist = euclideanRounded(points[i], points[j]);
      rows[i][j] = dist;
      rows[j][i] = dist;
    }
  }

  return new TableMatrix(rows);
}

/**
 * Wrap an explicit square table. The table must be symmetric, non-negative
 * and zero on the diagonal.
 */
export function matrixFromRows(rows: readonly (readonly number[])[]): DistanceMatrix {
  const n = rows.length;
  for (let i = 0; i < n; i++) {
    if (rows[i].length !== n) {
      throw new InvalidInstanceError(`row ${i} has ${rows[i].length} entries, expected ${n}`);
    }
    if (rows[i][i] !== 0) {
      throw new InvalidInstanceError(`distance from ${i} to itself must be 0`);
    }
    for (let j = 0; j < n; j++) {
      const d = rows[i][j];
      if (!Number.isFinite(d) || d < 0) {
        throw new InvalidInstanceError(`distance ${i}->${j} must be a non-negative number: ${d}`);
      }
      if (rows[j]?.[i] !== d) {
        throw new InvalidInstanceError(`distance ${i}<->${j} is not symmetric`);
      }
    }
  }
  return new TableMatrix(rows.map((r) => r.slice()));
}

/**
 * The `k` closest other cities of every city, nearest first. Equal
 * distances keep the lower city index first; `k` is clamped to `size - 1`.
 */
export function nearestNeighbors(matrix: DistanceMatrix, k: number): City[][] {
  const n = matrix.size;
  const take = Math.max(0, Math.min(k, n - 1));
  const result: City[][] = [];

  for (let a = 0; a < n; a++) {
    const others: City[] = [];
    for (let b = 0; b < n; b++) {
      if (b !== a) others.push(b);
    }
    others.sort((x, y) => matrix.distance(a, x) - matrix.distance(a, y) || x - y);
    result.push(others.slice(0, take));
  }

  return result;
}
