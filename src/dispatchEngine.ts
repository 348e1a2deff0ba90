import { PatternError } from './errors.js';
import { createLogger } from './logger.js';
import { dispatchDecisions, tableRebuilds, tableRoutes } from './metrics.js';
import { matches, validatePattern } from './pathMatcher.js';
import type { Route } from './route.js';
import type { RouteSource } from './routeSource.js';
import { RouteTable } from './routeTable.js';

const logger = createLogger('dispatch');

export type NoHandlerReason = 'error-path' | 'ignored' | 'forwarded' | 'unmatched';

export type Decision<H> =
  | { kind: 'handler'; handler: H; route: Route; pattern: string }
  | { kind: 'no-handler'; reason: NoHandlerReason };

export interface DispatchSignals {
  /** An earlier stage already chose where this request goes. */
  hasForwardMarker?: boolean;
  /** The request targets the gateway's own error page. */
  isErrorPath?: boolean;
}

/**
 * Decides, per request path, whether the proxy handler serves it.
 *
 * The route table is rebuilt lazily from the route source after
 * `invalidate()`. Only one rebuild runs at a time. Until the first table is
 * published, callers wait for that rebuild; afterwards a stale table starts a
 * rebuild in the background and callers answer from the published one until
 * the new generation replaces it. A failed rebuild leaves the previous table
 * in place and the engine stale, so the next call tries again.
 */
export class DispatchEngine<H> {
  private current: RouteTable<H> = RouteTable.empty();
  private stale = true;
  private generationCount = 0;
  // Bumped by invalidate(); a rebuild only clears `stale` if no invalidation
  // arrived while it was running.
  private epoch = 0;
  private inflight: Promise<void> | undefined;
  private ignoredSource: readonly string[] | undefined;
  private ignoredValid: readonly string[] = [];

  constructor(
    private readonly source: RouteSource,
    private readonly handler: H
  ) {}

  async decide(path: string, signals: DispatchSignals = {}): Promise<Decision<H>> {
    const decision = await this.evaluate(path, signals);
    dispatchDecisions.inc({ outcome: decision.kind === 'handler' ? 'handler' : decision.reason });
    return decision;
  }

  /** Marks the table stale. The rebuild happens on the next `decide`. */
  invalidate(): void {
    this.epoch++;
    this.stale = true;
  }

  isStale(): boolean {
    return this.stale;
  }

  /** The published table generation. */
  table(): RouteTable<H> {
    return this.current;
  }

  /** Number of tables published so far; 0 until the first rebuild succeeds. */
  generation(): number {
    return this.generationCount;
  }

  /** Rebuilds now if stale. Resolves once the table is fresh or the attempt failed. */
  async ensureFresh(): Promise<void> {
    if (!this.stale) return;
    await this.rebuildOnce();
  }

  private rebuildOnce(): Promise<void> {
    if (this.inflight === undefined) {
      this.inflight = this.rebuild().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  private async evaluate(path: string, signals: DispatchSignals): Promise<Decision<H>> {
    if (signals.isErrorPath) return { kind: 'no-handler', reason: 'error-path' };
    if (this.isIgnored(path)) return { kind: 'no-handler', reason: 'ignored' };
    if (signals.hasForwardMarker) return { kind: 'no-handler', reason: 'forwarded' };

    if (this.stale && this.generationCount === 0) {
      await this.rebuildOnce();
      // The rebuild may have loaded new ignored patterns.
      if (this.isIgnored(path)) return { kind: 'no-handler', reason: 'ignored' };
    } else if (this.stale) {
      this.rebuildOnce().catch((err) => {
        logger.error('Background rebuild failed', { error: String(err) });
      });
    }

    const entry = this.current.lookup(path);
    if (entry === undefined) return { kind: 'no-handler', reason: 'unmatched' };
    return { kind: 'handler', handler: entry.handler, route: entry.route, pattern: entry.pattern };
  }

  private isIgnored(path: string): boolean {
    return this.ignoredPatterns().some((pattern) => matches(pattern, path));
  }

  private async rebuild(): Promise<void> {
    const epoch = this.epoch;
    try {
      await this.source.refresh?.();
      const routes = this.source.routes();
      const next = RouteTable.build(routes, this.handler, (route, err) => {
        logger.warn('Skipping route with malformed path', { route: route.id, error: err.message });
      });
      if (next.size === 0) {
        logger.warn('No routes found from route source');
      }

      this.current = next;
      this.generationCount++;
      if (this.epoch === epoch) this.stale = false;

      tableRebuilds.inc({ outcome: 'success' });
      tableRoutes.set(next.size);
      logger.info('Route table rebuilt', {
        generation: this.generationCount,
        routes: next.size,
        stale: this.stale,
      });
    } catch (err) {
      tableRebuilds.inc({ outcome: 'failure' });
      logger.error('Route table rebuild failed; keeping previous table', {
        generation: this.generationCount,
        error: String(err),
      });
    }
  }

  /**
   * Validated ignored patterns. Revalidated only when the source hands out a
   * different list; if the source throws, the last good list stays in use.
   */
  private ignoredPatterns(): readonly string[] {
    let patterns: readonly string[];
    try {
      patterns = this.source.ignoredPaths();
    } catch (err) {
      logger.error('Reading ignored paths failed; using last known list', { error: String(err) });
      return this.ignoredValid;
    }
    if (patterns === this.ignoredSource) return this.ignoredValid;

    const valid: string[] = [];
    for (const pattern of patterns) {
      try {
        validatePattern(pattern);
        valid.push(pattern);
      } catch (err) {
        if (!(err instanceof PatternError)) throw err;
        logger.warn('Skipping malformed ignored path', { pattern, error: err.message });
      }
    }
    this.ignoredSource = patterns;
    this.ignoredValid = Object.freeze(valid);
    return this.ignoredValid;
  }
}
