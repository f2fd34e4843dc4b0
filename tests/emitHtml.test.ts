import { describe, it, expect } from 'vitest';
import { emitHtml } from '../src/io/emitHtml';
import type { Instance, SearchResult } from '../src/types';

describe('emitHtml', () => {
  it('plots both tours using the template', () => {
    const instance: Instance = {
      name: 'square4',
      points: [
        [0, 0],
        [0, 10],
        [10, 10],
        [10, 0],
      ],
      config: {},
    };
    const result: SearchResult = {
      strategy: { type: 'steepest' },
      solution: { tours: [[1, 2], [0, 3]] },
      initialCost: 56,
      cost: 40,
      iterations: 1,
      elapsedMs: 1,
    };
    const runTs = '2024-01-01T00:00:00Z';
    const html = emitHtml(instance, result, runTs, { size: 400, padding: 20 });
    expect(html).toContain('<h1>square4</h1>');
    expect(html).toContain(runTs);
    expect(html).toContain('Strategy: steepest | Cost: 40 | Iterations: 1');
    expect(html).toContain('<polygon points="20.0,20.0 380.0,20.0"');
    expect(html).toContain('<polygon points="20.0,380.0 380.0,380.0"');
    expect(html.match(/<circle /g)).toHaveLength(4);
    // one row per tour inside tbody
    const tbody = html.split('<tbody>')[1].split('</tbody>')[0];
    expect(tbody.match(/<tr>/g)).toHaveLength(2);
    expect(tbody).toContain('<tr><td>T0</td><td>2</td><td>20</td></tr>');
  });

  it('renders a custom template', () => {
    const html = emitHtml(
      { name: 'one', points: [[5, 5]], config: {} },
      {
        strategy: { type: 'memory' },
        solution: { tours: [[0], []] },
        initialCost: 0,
        cost: 0,
        iterations: 0,
        elapsedMs: 0,
      },
      '2024-01-01T00:00:00Z',
      { template: '{{title}}:{{#tours}}[{{count}}]{{/tours}}' },
    );
    expect(html).toBe('one:[1][0]');
  });
});
