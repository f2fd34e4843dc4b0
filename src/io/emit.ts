import { strategyLabel } from '../search';
import type { ExperimentStats, Instance, SearchResult } from '../types';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
  seed?: number;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  markdown?: string;
}

function toMarkdown(instance: Instance, result: SearchResult): string {
  const [t0, t1] = result.solution.tours;
  const lines: string[] = [
    `# ${instance.name}`,
    '',
    '| Strategy | Initial Cost | Final Cost | Iterations | Time (ms) |',
    '| -------- | ------------:| ----------:| ----------:| ---------:|',
    `| ${strategyLabel(result.strategy)} | ${result.initialCost} | ${result.cost} | ${
      result.iterations
    } | ${result.elapsedMs.toFixed(1)} |`,
    '',
    '## Tours',
    '',
    `- **T0** (${t0.length}): ${t0.join(' ')}`,
    `- **T1** (${t1.length}): ${t1.join(' ')}`,
    '',
  ];
  return lines.join('\n');
}

/** Serialize a search result to JSON and optional Markdown summary. */
export function emitResult(
  instance: Instance,
  result: SearchResult,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const json = JSON.stringify(
    {
      runTimestamp,
      instance: instance.name,
      cities: instance.points.length,
      seed: opts.seed,
      strategy: strategyLabel(result.strategy),
      initialCost: result.initialCost,
      cost: result.cost,
      iterations: result.iterations,
      elapsedMs: result.elapsedMs,
      tours: result.solution.tours,
    },
    null,
    2,
  );
  const out: EmitResult = { json, runTimestamp };
  if (opts.markdown) {
    out.markdown = toMarkdown(instance, result);
  }
  return out;
}

export function formatStatsRow(stats: ExperimentStats): string {
  return `| ${stats.algorithm} | ${stats.avgCost.toFixed(2)} (${stats.minCost} - ${
    stats.maxCost
  }) | ${stats.avgTimeMs.toFixed(2)} |`;
}

/** Comparison table of experiment statistics, one row per algorithm. */
export function emitExperimentMarkdown(stats: readonly ExperimentStats[]): string {
  const lines: string[] = [
    '| Instance | Algorithm | Cost avg (min - max) | Time (ms) |',
    '| -------- | --------- | -------------------- | --------- |',
  ];
  for (const s of stats) {
    lines.push(`| ${s.instance} ${formatStatsRow(s)}`);
  }
  lines.push('');
  return lines.join('\n');
}
