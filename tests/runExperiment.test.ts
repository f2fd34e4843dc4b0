import { describe, it, expect, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { runExperiment, summarizeRuns } from '../src/app/runExperiment';
import { totalCost } from '../src/core/solution';
import { buildDistanceMatrix } from '../src/distance';
import type { SearchResult } from '../src/types';

const clustersPath = fileURLToPath(new URL('../fixtures/clusters.json', import.meta.url));

function fakeRun(cost: number, elapsedMs: number, first: number): SearchResult {
  return {
    strategy: { type: 'steepest' },
    solution: { tours: [[first], []] },
    initialCost: cost,
    cost,
    iterations: 0,
    elapsedMs,
  };
}

describe('summarizeRuns', () => {
  it('collects min, max and averages', () => {
    const stats = summarizeRuns('steepest', 'demo', [
      fakeRun(50, 1, 0),
      fakeRun(40, 2, 1),
      fakeRun(60, 3, 2),
    ]);
    expect(stats).toEqual({
      algorithm: 'steepest',
      instance: 'demo',
      runs: 3,
      minCost: 40,
      maxCost: 60,
      avgCost: 50,
      avgTimeMs: 2,
      best: { tours: [[1], []] },
    });
  });

  it('refuses an empty run list', () => {
    expect(() => summarizeRuns('memory', 'demo', [])).toThrow(/No runs recorded/);
  });
});

describe('runExperiment', () => {
  it('runs every strategy from the same starts', () => {
    const report = runExperiment({ instancePath: clustersPath, runs: 3 });
    const matrix = buildDistanceMatrix(report.instance.points);
    expect(report.stats.map((s) => s.algorithm)).toEqual(['steepest', 'candidates(k=3)', 'memory']);
    for (const s of report.stats) {
      expect(s.runs).toBe(3);
      expect(s.minCost).toBeLessThanOrEqual(s.avgCost);
      expect(s.avgCost).toBeLessThanOrEqual(s.maxCost);
      expect(totalCost(matrix, s.best)).toBe(s.minCost);
    }
  });

  it('uses regret starts on request and logs when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const report = runExperiment({
      instancePath: clustersPath,
      runs: 2,
      strategies: ['memory'],
      init: 'regret',
      verbose: true,
    });
    expect(report.stats).toHaveLength(1);
    expect(log).toHaveBeenCalledWith('Running memory on clusters8 (2 runs)');
    log.mockRestore();
  });

  it('rejects a non-positive run count', () => {
    expect(() => runExperiment({ instancePath: clustersPath, runs: 0 })).toThrow(/positive integer/);
  });
});
