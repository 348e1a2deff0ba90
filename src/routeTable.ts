import { PatternError } from './errors.js';
import { comparator, matches, validatePattern } from './pathMatcher.js';
import type { Route } from './route.js';

export interface TableEntry<H> {
  readonly pattern: string;
  readonly route: Route;
  readonly handler: H;
}

export type SkipListener = (route: Route, error: PatternError) => void;

/**
 * One generation of the path → handler mapping. A table is built in full
 * before anyone can see it and is never mutated afterwards; a new set of
 * routes means a new table.
 */
export class RouteTable<H> {
  private constructor(private readonly entries: ReadonlyMap<string, TableEntry<H>>) {
    Object.freeze(this);
  }

  static empty<H>(): RouteTable<H> {
    return new RouteTable<H>(new Map());
  }

  /**
   * Registers every route's `fullPath` against `handler`. A later route with
   * the same `fullPath` replaces the earlier one. Routes whose pattern does
   * not validate are reported to `onSkip` and left out.
   */
  static build<H>(routes: readonly Route[], handler: H, onSkip?: SkipListener): RouteTable<H> {
    const entries = new Map<string, TableEntry<H>>();
    for (const route of routes) {
      try {
        validatePattern(route.fullPath);
      } catch (err) {
        if (!(err instanceof PatternError)) throw err;
        onSkip?.(route, err);
        continue;
      }
      entries.set(route.fullPath, Object.freeze({ pattern: route.fullPath, route, handler }));
    }
    return new RouteTable(entries);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): TableEntry<H>[] {
    return [...this.entries.values()];
  }

  /** Exact registration first, then the most specific matching pattern. */
  lookup(path: string): TableEntry<H> | undefined {
    const direct = this.entries.get(path);
    if (direct !== undefined) return direct;

    const order = comparator(path);
    return this.list()
      .filter((entry) => matches(entry.pattern, path))
      .sort((a, b) => order(a.pattern, b.pattern))[0];
  }
}
