import { readFileSync } from 'fs';
import Mustache from 'mustache';
import { tourCost } from '../core/solution';
import { buildDistanceMatrix, type DistanceMatrix } from '../distance';
import { strategyLabel } from '../search';
import type { Instance, SearchResult } from '../types';

const defaultTemplate = readFileSync(new URL('./templates/plot.mustache', import.meta.url), 'utf8');
const defaultPartials = {
  tour: readFileSync(new URL('./templates/tour.mustache', import.meta.url), 'utf8'),
};

const TOUR_COLORS = ['#d62728', '#1f77b4'] as const;

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
  /** Width and height of the square plot, in pixels */
  size?: number;
  padding?: number;
  /** Reuse an existing matrix for the per-tour costs */
  matrix?: DistanceMatrix;
}

interface ViewModel {
  title: string;
  runTimestamp: string;
  strategy: string;
  cost: number;
  iterations: number;
  size: number;
  tours: {
    index: number;
    color: string;
    count: number;
    cost: number;
    path: string;
    cities: { city: number; x: string; y: string }[];
  }[];
}

/** Render both tours of a result as an SVG plot inside an HTML page. */
export function emitHtml(
  instance: Instance,
  result: SearchResult,
  runTimestamp = new Date().toISOString(),
  opts: EmitHtmlOptions = {},
): string {
  const size = opts.size ?? 600;
  const pad = opts.padding ?? 20;
  const matrix = opts.matrix ?? buildDistanceMatrix(instance.points);

  const xs = instance.points.map((p) => p[0]);
  const ys = instance.points.map((p) => p[1]);
  const minX = Math.min(...xs);
  const minY = Math.min(...ys);
  const span = Math.max(Math.max(...xs) - minX, Math.max(...ys) - minY, 1);
  const scale = (size - 2 * pad) / span;
  // SVG y grows downward
  const project = (city: number) => {
    const [x, y] = instance.points[city];
    return {
      city,
      x: (pad + (x - minX) * scale).toFixed(1),
      y: (size - pad - (y - minY) * scale).toFixed(1),
    };
  };

  const view: ViewModel = {
    title: instance.name,
    runTimestamp,
    strategy: strategyLabel(result.strategy),
    cost: result.cost,
    iterations: result.iterations,
    size,
    tours: result.solution.tours.map((tour, index) => {
      const cities = tour.map(project);
      return {
        index,
        color: TOUR_COLORS[index],
        count: tour.length,
        cost: tourCost(matrix, tour),
        path: cities.map((c) => `${c.x},${c.y}`).join(' '),
        cities,
      };
    }),
  };
  const template = opts.template ?? defaultTemplate;
  const partials = opts.partials ?? defaultPartials;
  return Mustache.render(template, view, partials);
}

export default emitHtml;
