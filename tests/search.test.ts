import { describe, it, expect, vi, afterEach } from 'vitest';
import seedrandom from 'seedrandom';
import { randomSolution } from '../src/construct';
import { applyMove } from '../src/core/applyMove';
import { candidateMoves, generateEdgeSwaps, generateNodeSwaps, improvingMoves } from '../src/core/neighborhood';
import type { Move } from '../src/core/moves';
import { cloneSolution, PositionIndex, totalCost, validateSolution } from '../src/core/solution';
import { buildDistanceMatrix, nearestNeighbors } from '../src/distance';
import { InvalidSolutionError } from '../src/errors';
import { parseStrategy, runSearch, strategyLabel, type SearchProgress } from '../src/search';
import type { Point, Solution, Strategy } from '../src/types';

const strategies: Strategy[] = [
  { type: 'steepest' },
  { type: 'candidates', k: 5 },
  { type: 'memory' },
];

function scatter(n: number, seed: string): Point[] {
  const rng = seedrandom(seed);
  return Array.from({ length: n }, () => [Math.floor(rng() * 200), Math.floor(rng() * 200)] as const);
}

const scaledSquare = buildDistanceMatrix([
  [0, 0],
  [0, 10],
  [10, 10],
  [10, 0],
]);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('runSearch on degenerate sizes', () => {
  const cases: [string, Point[], Solution][] = [
    ['no cities', [], { tours: [[], []] }],
    ['one city', [[3, 4]], { tours: [[0], []] }],
    ['two cities', [[0, 0], [6, 8]], { tours: [[0], [1]] }],
  ];

  for (const [label, points, initial] of cases) {
    for (const strategy of strategies) {
      it(`${strategyLabel(strategy)} keeps ${label} at zero cost`, () => {
        const result = runSearch(strategy, initial, buildDistanceMatrix(points));
        expect(result.cost).toBe(0);
        expect(result.iterations).toBe(0);
        expect(result.solution).toEqual(initial);
      });
    }
  }
});

describe('runSearch on a unit square', () => {
  // every pair of corners is 1 apart once rounded
  const matrix = buildDistanceMatrix([
    [0, 0],
    [0, 1],
    [1, 1],
    [1, 0],
  ]);

  it('already sits at the cost of the adjacent pairing', () => {
    const result = runSearch({ type: 'steepest' }, { tours: [[0, 2], [1, 3]] }, matrix);
    const D = (i: number, j: number) => matrix.distance(i, j);
    expect(result.initialCost).toBe(2 * D(0, 2) + 2 * D(1, 3));
    expect(result.cost).toBe(2 * (D(0, 1) + D(2, 3)));
    expect(improvingMoves(matrix, result.solution)).toEqual([]);
  });
});

describe('runSearch on a 10x10 square', () => {
  for (const strategy of [...strategies, { type: 'candidates', k: 1 } satisfies Strategy]) {
    it(`${strategyLabel(strategy)} pairs adjacent corners`, () => {
      const initial: Solution = { tours: [[0, 2], [1, 3]] };
      const result = runSearch(strategy, initial, scaledSquare);
      expect(result.initialCost).toBe(56);
      expect(result.cost).toBe(40);
      expect(result.iterations).toBe(1);
      expect(result.solution).toEqual({ tours: [[1, 2], [0, 3]] });
      expect(improvingMoves(scaledSquare, result.solution)).toEqual([]);
    });
  }

  it('leaves the initial solution untouched', () => {
    const initial: Solution = { tours: [[0, 2], [1, 3]] };
    runSearch({ type: 'memory' }, initial, scaledSquare);
    expect(initial).toEqual({ tours: [[0, 2], [1, 3]] });
  });

  it('logs applied moves when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    runSearch({ type: 'steepest' }, { tours: [[0, 2], [1, 3]] }, scaledSquare, { verbose: true });
    expect(log).toHaveBeenCalledWith('steepest: #1 swap 0@T0 <-> 1@T1 delta=-16 cost=40');
  });
});

describe('runSearch input checks', () => {
  it('rejects a solution that repeats a city', () => {
    expect(() =>
      runSearch({ type: 'steepest' }, { tours: [[0, 1], [1, 2]] }, scaledSquare),
    ).toThrow(InvalidSolutionError);
  });

  it('rejects a solution that misses a city', () => {
    expect(() => runSearch({ type: 'memory' }, { tours: [[0, 1], [2]] }, scaledSquare)).toThrow(
      /cities not covered: 3/,
    );
  });

  it('rejects an empty candidate list', () => {
    expect(() =>
      runSearch({ type: 'candidates', k: 0 }, { tours: [[0, 2], [1, 3]] }, scaledSquare),
    ).toThrow(/positive integer/);
  });

  it('parses strategy names', () => {
    expect(parseStrategy('candidates', 7)).toEqual({ type: 'candidates', k: 7 });
    expect(parseStrategy('memory')).toEqual({ type: 'memory' });
    expect(() => parseStrategy('tabu')).toThrow(/Unknown strategy "tabu"/);
  });
});

describe('search properties on scattered cities', () => {
  const points = scatter(30, 'scatter-30');
  const matrix = buildDistanceMatrix(points);
  const initial = randomSolution(points.length, seedrandom('initial-30'));

  for (const strategy of strategies) {
    it(`${strategyLabel(strategy)} lowers the cost with every move`, () => {
      const events: SearchProgress[] = [];
      const result = runSearch(strategy, initial, matrix, { progress: (e) => events.push(e) });

      expect(result.iterations).toBe(events.length);
      expect(result.iterations).toBeGreaterThan(0);
      let previous = result.initialCost;
      for (const e of events) {
        expect(e.move.delta).toBeLessThan(0);
        expect(e.cost).toBeLessThan(previous);
        previous = e.cost;
      }
      expect(Math.abs(previous - result.cost)).toBeLessThan(1e-6);
      expect(result.cost).toBe(totalCost(matrix, result.solution));
      expect(() => validateSolution(result.solution, points.length)).not.toThrow();
      expect(result.solution.tours[0]).toHaveLength(initial.tours[0].length);
    });
  }

  it('steepest and memory stop at a local optimum of the full neighborhood', () => {
    for (const strategy of [strategies[0], strategies[2]]) {
      const result = runSearch(strategy, initial, matrix);
      expect(improvingMoves(matrix, result.solution)).toEqual([]);
    }
  });

  it('candidates stops when no candidate move improves', () => {
    const result = runSearch({ type: 'candidates', k: 5 }, initial, matrix);
    const index = new PositionIndex(result.solution);
    expect(candidateMoves(matrix, result.solution, index, nearestNeighbors(matrix, 5))).toEqual([]);
  });

  it('steepest is deterministic', () => {
    const a = runSearch({ type: 'steepest' }, initial, matrix);
    const b = runSearch({ type: 'steepest' }, initial, matrix);
    expect(a.solution).toEqual(b.solution);
    expect(a.cost).toBe(b.cost);
    expect(a.iterations).toBe(b.iterations);
  });
});

describe('move deltas', () => {
  const points = scatter(12, 'scatter-12');
  const matrix = buildDistanceMatrix(points);
  const solution = randomSolution(points.length, seedrandom('initial-12'));
  const moves: Move[] = [
    ...generateEdgeSwaps(matrix, solution.tours[0]),
    ...generateEdgeSwaps(matrix, solution.tours[1]),
    ...generateNodeSwaps(matrix, solution),
  ];

  it('match the cost change of every applied move and keep the partition', () => {
    expect(moves.length).toBeGreaterThan(0);
    const before = totalCost(matrix, solution);
    for (const move of moves) {
      const copy = cloneSolution(solution);
      const outcome = applyMove(copy, new PositionIndex(copy), move);
      expect(outcome).toEqual({ applied: true });
      expect(() => validateSolution(copy, points.length)).not.toThrow();
      expect(Math.abs(totalCost(matrix, copy) - before - move.delta)).toBeLessThan(1e-6);
    }
  });
});
