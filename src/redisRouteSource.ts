import { RouteDefinitionSchema, type RouteDefinition } from './config.js';
import { RouteSourceError } from './errors.js';
import { createLogger } from './logger.js';
import type { Route } from './route.js';
import type { RefreshableRouteSource } from './routeSource.js';
import { StaticRouteSource, type RouteSourceOptions } from './staticRouteSource.js';

const logger = createLogger('redis-routes');

/** The slice of an ioredis client the route source reads through. */
export interface RouteStore {
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  smembers(key: string): Promise<string[]>;
}

/** The slice of an ioredis subscriber connection used for change notifications. */
export interface RouteChangeFeed {
  subscribe(channel: string): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
}

export interface RedisRouteSourceOptions extends Omit<RouteSourceOptions, 'routes' | 'ignoredPatterns'> {
  /** List of JSON route definitions, in routing order. */
  routesKey: string;
  /** Set of ignored path patterns. */
  ignoredKey: string;
}

/**
 * Discovery-backed route source. Route definitions live in Redis and are
 * read on `refresh()`; between refreshes the last loaded snapshot answers
 * every read. A failed refresh keeps that snapshot.
 */
export class RedisRouteSource implements RefreshableRouteSource {
  private snapshot: StaticRouteSource;

  constructor(
    private readonly redis: RouteStore,
    private readonly options: RedisRouteSourceOptions
  ) {
    this.snapshot = new StaticRouteSource({ ...options, routes: [] });
  }

  async refresh(): Promise<void> {
    let rawRoutes: string[];
    let ignored: string[];
    try {
      [rawRoutes, ignored] = await Promise.all([
        this.redis.lrange(this.options.routesKey, 0, -1),
        this.redis.smembers(this.options.ignoredKey),
      ]);
    } catch (err) {
      throw new RouteSourceError(`Reading routes from Redis failed: ${String(err)}`, { cause: err });
    }

    const routes: RouteDefinition[] = [];
    rawRoutes.forEach((raw, index) => {
      const def = this.parse(raw);
      if (def === undefined) {
        logger.warn('Skipping invalid route definition', { key: this.options.routesKey, index });
        return;
      }
      routes.push(def);
    });

    // Set members come back unordered; sort so equal inputs give equal snapshots.
    this.snapshot = new StaticRouteSource({
      ...this.options,
      routes,
      ignoredPatterns: [...ignored].sort(),
    });
    logger.debug('Routes loaded from Redis', { routes: routes.length, ignored: ignored.length });
  }

  ignoredPaths(): readonly string[] {
    return this.snapshot.ignoredPaths();
  }

  routes(): readonly Route[] {
    return this.snapshot.routes();
  }

  matchingRoute(path: string): Route | undefined {
    return this.snapshot.matchingRoute(path);
  }

  private parse(raw: string): RouteDefinition | undefined {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return undefined;
    }
    const parsed = RouteDefinitionSchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }
}

/**
 * Calls `onChange` for every message published on `channel`. Publishers
 * announce that the route definitions changed; the payload is not read.
 */
export async function subscribeRouteChanges(
  feed: RouteChangeFeed,
  channel: string,
  onChange: () => void
): Promise<void> {
  feed.on('message', (received) => {
    if (received !== channel) return;
    logger.info('Route change announced', { channel });
    onChange();
  });
  await feed.subscribe(channel);
}
