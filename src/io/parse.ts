import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import { InvalidInstanceError } from '../errors';
import type { InitKind, Instance, InstanceConfig, Point, StrategyName } from '../types';

type PlainObj = Record<string, unknown>;

function isPlainObj(value: unknown): value is PlainObj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const STRATEGIES: readonly StrategyName[] = ['steepest', 'candidates', 'memory'];
const INIT_KINDS: readonly InitKind[] = ['regret', 'random'];

function ensurePoint(x: number, y: number, where: string): Point {
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidInstanceError(`invalid coordinates at ${where}: ${x},${y}`);
  }
  return [x, y];
}

/**
 * Parse a TSPLIB file with `EDGE_WEIGHT_TYPE: EUC_2D` and a
 * `NODE_COORD_SECTION`.
 */
export function parseTsplib(text: string, source?: string): Instance {
  let name = source ? basename(source, extname(source)) : 'instance';
  let dimension: number | undefined;
  let edgeWeightType: string | undefined;
  const points: Point[] = [];
  let inCoords = false;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('COMMENT')) continue;
    if (line === 'EOF') break;
    if (line === 'NODE_COORD_SECTION') {
      inCoords = true;
      continue;
    }

    if (inCoords) {
      const m = line.match(/^(\d+)\s+(\S+)\s+(\S+)$/);
      if (m) {
        points.push(ensurePoint(parseFloat(m[2]), parseFloat(m[3]), `node ${m[1]}`));
        continue;
      }
      inCoords = false;
    }

    const kv = line.match(/^([A-Za-z_]+)\s*:\s*(.+)$/);
    if (!kv) continue;
    const value = kv[2].trim();
    switch (kv[1]) {
      case 'NAME':
        name = value;
        break;
      case 'DIMENSION':
        dimension = Number(value);
        if (!Number.isInteger(dimension)) {
          throw new InvalidInstanceError(`invalid DIMENSION "${value}"`, source);
        }
        break;
      case 'EDGE_WEIGHT_TYPE':
        edgeWeightType = value;
        break;
      default:
        break;
    }
  }

  if (edgeWeightType !== 'EUC_2D') {
    throw new InvalidInstanceError(
      edgeWeightType ? `unsupported EDGE_WEIGHT_TYPE ${edgeWeightType}` : 'missing EDGE_WEIGHT_TYPE',
      source,
    );
  }
  if (points.length === 0) {
    throw new InvalidInstanceError('no coordinates found', source);
  }
  if (dimension !== undefined && dimension !== points.length) {
    throw new InvalidInstanceError(
      `found ${points.length} coordinates but DIMENSION is ${dimension}`,
      source,
    );
  }

  return { name, points, config: {} };
}

function parseCity(value: unknown, i: number): Point {
  if (Array.isArray(value) && value.length === 2) {
    return ensurePoint(Number(value[0]), Number(value[1]), `city ${i}`);
  }
  if (isPlainObj(value)) {
    return ensurePoint(Number(value.x), Number(value.y), `city ${i}`);
  }
  throw new InvalidInstanceError(`city ${i} must be [x, y] or {x, y}`);
}

const NUMBER_RULES = {
  finite: { test: Number.isFinite, expected: 'a finite number' },
  integer: { test: Number.isInteger, expected: 'an integer' },
  positive: { test: (n: number) => Number.isInteger(n) && n >= 1, expected: 'a positive integer' },
} as const;

function configNumber(
  value: unknown,
  field: string,
  rule: keyof typeof NUMBER_RULES,
  source?: string,
): number {
  const n =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim() !== ''
        ? Number(value)
        : NaN;
  const { test, expected } = NUMBER_RULES[rule];
  if (!test(n)) {
    throw new InvalidInstanceError(`config.${field} must be ${expected}, got ${JSON.stringify(value)}`, source);
  }
  return n;
}

function parseConfig(obj: unknown, source?: string): InstanceConfig {
  const cfg: InstanceConfig = {};
  if (!isPlainObj(obj)) return cfg;
  if (obj.strategy !== undefined) {
    const s = STRATEGIES.find((name) => name === obj.strategy);
    if (!s) throw new InvalidInstanceError(`unknown strategy "${String(obj.strategy)}"`, source);
    cfg.strategy = s;
  }
  if (obj.init !== undefined) {
    const kind = INIT_KINDS.find((name) => name === obj.init);
    if (!kind) throw new InvalidInstanceError(`unknown init "${String(obj.init)}"`, source);
    cfg.init = kind;
  }
  if (obj.k !== undefined) cfg.k = configNumber(obj.k, 'k', 'positive', source);
  if (obj.seed !== undefined) cfg.seed = configNumber(obj.seed, 'seed', 'integer', source);
  if (obj.starts !== undefined) {
    cfg.starts = configNumber(obj.starts, 'starts', 'positive', source);
  }
  if (obj.regretWeight !== undefined) {
    cfg.regretWeight = configNumber(obj.regretWeight, 'regretWeight', 'finite', source);
  }
  return cfg;
}

/**
 * Parse an instance document `{ name?, cities: [[x, y], ...], config? }`.
 */
export function parseInstanceJson(json: unknown, source?: string): Instance {
  if (!isPlainObj(json)) {
    throw new InvalidInstanceError('instance JSON must be an object', source);
  }
  if (!Array.isArray(json.cities) || json.cities.length === 0) {
    throw new InvalidInstanceError('instance must list at least one city', source);
  }
  const name =
    typeof json.name === 'string'
      ? json.name
      : source
        ? basename(source, extname(source))
        : 'instance';
  return {
    name,
    points: json.cities.map(parseCity),
    config: parseConfig(json.config, source),
  };
}

/** Read an instance from disk; `.json` files use the JSON layout, anything else TSPLIB. */
export function loadInstance(path: string): Instance {
  const raw = readFileSync(path, 'utf8');
  if (extname(path).toLowerCase() === '.json') {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidInstanceError(`malformed JSON: ${reason}`, path);
    }
    return parseInstanceJson(json, path);
  }
  return parseTsplib(raw, path);
}
