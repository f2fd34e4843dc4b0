import type { Instance, Solution } from '../types';

function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** One row per city in tour order: which tour, where in it, and its coordinates. */
export function emitCsv(instance: Instance, solution: Solution): string {
  const header = ['instance', 'tour', 'position', 'city', 'x', 'y'];
  const rows = [header.join(',')];
  const name = escapeCsv(instance.name);
  solution.tours.forEach((tour, t) => {
    tour.forEach((city, pos) => {
      const [x, y] = instance.points[city];
      rows.push([name, String(t), String(pos), String(city), String(x), String(y)].join(','));
    });
  });
  return rows.join('\n');
}
