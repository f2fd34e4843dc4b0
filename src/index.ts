import { Command, InvalidArgumentError, Option } from 'commander';
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { runExperiment } from './app/runExperiment';
import { solveInstance } from './app/solveInstance';
import { describeMove } from './core/moves';
import { emitExperimentMarkdown } from './io/emit';
import { emitCsv } from './io/emitCsv';
import { emitHtml } from './io/emitHtml';
import type { ProgressFn } from './search';
import { formatTimestampToken } from './time';
import type { InitKind, StrategyName } from './types';

const STRATEGY_CHOICES: StrategyName[] = ['steepest', 'candidates', 'memory'];
const INIT_CHOICES: InitKind[] = ['regret', 'random'];

interface SolveCliOptions {
  instance: string;
  strategy?: StrategyName;
  k?: number;
  seed?: number;
  starts?: number;
  init?: InitKind;
  regretWeight?: number;
  verbose?: boolean;
  progress?: boolean;
  out?: string;
  csv?: string;
  html?: string | boolean;
  markdown?: string;
}

interface ExperimentCliOptions {
  instance: string;
  runs?: number;
  strategies?: StrategyName[];
  k?: number;
  seed?: number;
  init?: InitKind;
  regretWeight?: number;
  verbose?: boolean;
  markdown?: string;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}"`);
  }
  return n;
}

function parseStrategyList(value: string): StrategyName[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => {
      const name = STRATEGY_CHOICES.find((c) => c === s);
      if (!name) throw new InvalidArgumentError(`Unknown strategy "${s}"`);
      return name;
    });
}

function buildProgressLogger(verbose: boolean): ProgressFn {
  return ({ strategy, iteration, cost, move }) => {
    const detail = verbose ? ` move=${describeMove(move)}` : '';
    console.log(`progress ${strategy}: iteration=${iteration} cost=${cost}${detail}`);
  };
}

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

function tokenizer(runTimestamp: string): (s: string) => string {
  const tsToken = formatTimestampToken(runTimestamp);
  return (s) => s.replace(/\$\{timestamp\}/g, tsToken);
}

export const program = new Command();

program
  .name('dualtour')
  .description('Split cities into two closed tours and improve them by local search')
  .version('0.1.0')
  .showHelpAfterError();

program
  .command('solve', { isDefault: true })
  .requiredOption('--instance <file>', 'Path to a TSPLIB (.tsp) or JSON instance')
  .addOption(
    new Option('--strategy <name>', 'Local search strategy').choices(STRATEGY_CHOICES),
  )
  .option('--k <n>', 'Nearest neighbours per city for the candidate strategy', parseInteger)
  .option('--seed <seed>', 'Random seed', parseInteger)
  .option('--starts <n>', 'Construction attempts from different start cities', parseInteger)
  .addOption(new Option('--init <kind>', 'Initial solution').choices(INIT_CHOICES))
  .option('--regret-weight <w>', 'Weight of the insertion cost against its regret', parseNumber)
  .option('--verbose', 'Print every applied move')
  .option('--progress', 'Print search progress')
  .option('--out <file>', 'Write result JSON to this path (overwrite)')
  .option('--markdown <file>', 'Write a Markdown summary to this path')
  .option('--csv <file>', 'Write tour cities CSV to this path')
  .option('--html [file]', 'Write an HTML plot to this path (or stdout)')
  .action((opts: SolveCliOptions) => {
    const result = solveInstance({
      instancePath: opts.instance,
      strategy: opts.strategy,
      k: opts.k,
      seed: opts.seed,
      starts: opts.starts,
      init: opts.init,
      regretWeight: opts.regretWeight,
      markdown: Boolean(opts.markdown),
      verbose: opts.verbose,
      progress: opts.progress ? buildProgressLogger(Boolean(opts.verbose)) : undefined,
    });
    const runTs = result.runTimestamp;
    const tokenize = tokenizer(runTs);

    if (opts.out) {
      writeOutput(tokenize(opts.out), result.json);
    }
    if (opts.markdown && result.markdown) {
      writeOutput(tokenize(opts.markdown), result.markdown);
    }
    if (opts.csv) {
      writeOutput(tokenize(opts.csv), emitCsv(result.instance, result.result.solution));
    }
    if (opts.html !== undefined) {
      const html = emitHtml(result.instance, result.result, runTs, { matrix: result.matrix });
      if (typeof opts.html === 'string') {
        writeOutput(tokenize(opts.html), html);
      } else {
        console.log(html);
      }
    }

    console.log(result.json);
  });

program
  .command('experiment')
  .description('Compare strategies over repeated runs')
  .requiredOption('--instance <file>', 'Path to a TSPLIB (.tsp) or JSON instance')
  .option('--runs <n>', 'Runs per strategy', parseInteger)
  .option('--strategies <list>', 'Comma-separated strategies to compare', parseStrategyList)
  .option('--k <n>', 'Nearest neighbours per city for the candidate strategy', parseInteger)
  .option('--seed <seed>', 'Random seed', parseInteger)
  .addOption(new Option('--init <kind>', 'Initial solutions').choices(INIT_CHOICES))
  .option('--regret-weight <w>', 'Weight of the insertion cost against its regret', parseNumber)
  .option('--verbose', 'Print each strategy as it starts')
  .option('--markdown <file>', 'Write the comparison table to this path')
  .action((opts: ExperimentCliOptions) => {
    const report = runExperiment({
      instancePath: opts.instance,
      runs: opts.runs,
      strategies: opts.strategies,
      k: opts.k,
      seed: opts.seed,
      init: opts.init,
      regretWeight: opts.regretWeight,
      verbose: opts.verbose,
    });
    const table = emitExperimentMarkdown(report.stats);
    if (opts.markdown) {
      writeOutput(tokenizer(new Date().toISOString())(opts.markdown), table);
    }
    console.log(table);
  });

export function run(argv: readonly string[] = process.argv): Command {
  program.parse([...argv]);
  return program;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run();
}
