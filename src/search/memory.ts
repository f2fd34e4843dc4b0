import { isImproving, moveKey, type Move } from '../core/moves';
import { improvingMoves, movesAroundCities } from '../core/neighborhood';
import type { PositionIndex } from '../core/solution';
import type { City } from '../types';
import { commitMove, type SearchCtx, type SearchState } from './context';

/**
 * How a remembered move relates to the current solution:
 * - `applicable`: can be applied now with its recorded delta
 * - `deferred`: both edges exist but in opposite directions; may fit later
 * - `stale`: no longer describes the solution and is dropped
 */
export type MoveStatus = 'applicable' | 'deferred' | 'stale';

export function classifyMove(index: PositionIndex, move: Move): MoveStatus {
  if (move.kind === 'edge') {
    const ab = index.edgeOrientation(move.a, move.b);
    const cd = index.edgeOrientation(move.c, move.d);
    if (ab === 0 || cd === 0) return 'stale';
    if (index.tourOfCity(move.a) !== index.tourOfCity(move.c)) return 'stale';
    return ab === cd ? 'applicable' : 'deferred';
  }

  if (index.tourOfCity(move.y1) !== move.tour1 || index.tourOfCity(move.y2) !== move.tour2) {
    return 'stale';
  }
  const flankedBy = (y: City, x: City, z: City): boolean => {
    const prev = index.predecessor(y);
    const next = index.successor(y);
    return (prev === x && next === z) || (prev === z && next === x);
  };
  return flankedBy(move.y1, move.x1, move.z1) && flankedBy(move.y2, move.x2, move.z2)
    ? 'applicable'
    : 'stale';
}

/** Improving moves ordered by ascending delta, without duplicates. */
export class MoveList {
  private entries: Move[] = [];
  private readonly keys = new Set<string>();

  get size(): number {
    return this.entries.length;
  }

  toArray(): readonly Move[] {
    return this.entries;
  }

  /** Add improving moves not already listed and restore the delta order. */
  merge(moves: Iterable<Move>): void {
    let added = false;
    for (const m of moves) {
      if (!isImproving(m)) continue;
      const key = moveKey(m);
      if (this.keys.has(key)) continue;
      this.keys.add(key);
      this.entries.push(m);
      added = true;
    }
    if (added) {
      this.entries.sort((x, y) => x.delta - y.delta);
    }
  }

  /**
   * Remove and return the first applicable move, dropping stale entries
   * met on the way. Deferred entries stay listed.
   */
  takeApplicable(index: PositionIndex): Move | undefined {
    const kept: Move[] = [];
    let found: Move | undefined;
    let i = 0;
    for (; i < this.entries.length; i++) {
      const m = this.entries[i];
      const status = classifyMove(index, m);
      if (status === 'deferred') {
        kept.push(m);
        continue;
      }
      this.keys.delete(moveKey(m));
      if (status === 'applicable') {
        found = m;
        i++;
        break;
      }
    }
    this.entries = kept.concat(this.entries.slice(i));
    return found;
  }
}

function affectedCities(index: PositionIndex, move: Move): Set<City> {
  const core: City[] =
    move.kind === 'edge'
      ? [move.a, move.b, move.c, move.d]
      : [move.x1, move.y1, move.z1, move.x2, move.y2, move.z2];
  const affected = new Set<City>(core);
  for (const city of core) {
    const prev = index.predecessor(city);
    const next = index.successor(city);
    if (prev !== undefined) affected.add(prev);
    if (next !== undefined) affected.add(next);
  }
  return affected;
}

/**
 * Steepest descent over a remembered move list. The list is filled by full
 * enumeration; after each applied move only the moves around the cities it
 * touched are regenerated and merged back in. When the list runs dry the
 * neighborhood is enumerated once more, so the run ends at a local optimum.
 */
export function memorySearch(ctx: SearchCtx, state: SearchState): SearchState {
  const list = new MoveList();
  list.merge(improvingMoves(ctx.matrix, ctx.solution));

  for (;;) {
    let move = list.takeApplicable(ctx.index);
    if (!move) {
      // a reversal flips edges inside the segment without touching their cities
      list.merge(improvingMoves(ctx.matrix, ctx.solution));
      move = list.takeApplicable(ctx.index);
      if (!move) return state;
      if (ctx.verbose) console.log(`${ctx.strategy}: list exhausted, rescanned neighborhood`);
    }
    const outcome = commitMove(ctx, state, move);
    if (!outcome.applied) {
      throw new Error(`memory: move classified applicable was refused (${outcome.reason})`);
    }
    const around = affectedCities(ctx.index, move);
    list.merge(movesAroundCities(ctx.matrix, ctx.solution, ctx.index, around));
  }
}
