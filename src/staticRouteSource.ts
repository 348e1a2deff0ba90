import type { RouteDefinition } from './config.js';
import { comparator, matches } from './pathMatcher.js';
import { createRoute, type Route } from './route.js';
import type { RouteSource } from './routeSource.js';

export interface RouteSourceOptions {
  routes: readonly RouteDefinition[];
  ignoredPatterns?: readonly string[];
  /** Shared path prefix, e.g. "/api". Empty for none. */
  prefix?: string;
  /** Remove the shared prefix from the forwarded path. */
  stripPrefix?: boolean;
  retryable?: boolean;
  sensitiveHeaders?: readonly string[];
}

/** Literal segments of a route pattern before its first wildcard, e.g. "/orders" for "/orders/**". */
function routePrefixOf(pattern: string): string {
  const wildcard = pattern.search(/[*?]/);
  if (wildcard === -1) return '';
  const boundary = pattern.lastIndexOf('/', wildcard);
  return boundary > 0 ? pattern.slice(0, boundary) : '';
}

/**
 * Route source over a fixed list of route definitions, typically the
 * gateway configuration. Routes are registered under `prefix + path`.
 */
export class StaticRouteSource implements RouteSource {
  private readonly definitions: readonly RouteDefinition[];
  // One definition per path, the last one declared, in first-declared position.
  private readonly byPath: readonly RouteDefinition[];
  private readonly ignored: readonly string[];
  private readonly resolved: readonly Route[];
  private readonly prefix: string;
  private readonly stripPrefix: boolean;
  private readonly retryable: boolean;
  private readonly sensitiveHeaders: readonly string[] | undefined;

  constructor(options: RouteSourceOptions) {
    this.definitions = [...options.routes];
    this.byPath = [...new Map(this.definitions.map((def): [string, RouteDefinition] => [def.path, def])).values()];
    this.ignored = Object.freeze([...(options.ignoredPatterns ?? [])]);
    this.prefix = options.prefix ?? '';
    this.stripPrefix = options.stripPrefix ?? true;
    this.retryable = options.retryable ?? false;
    this.sensitiveHeaders = options.sensitiveHeaders;
    this.resolved = Object.freeze(
      this.definitions.map((def) =>
        createRoute({
          id: def.id,
          path: def.path,
          location: this.locationOf(def),
          prefix: this.prefix,
          retryable: def.retryable ?? this.retryable,
          sensitiveHeaders: def.sensitiveHeaders,
          defaultSensitiveHeaders: this.sensitiveHeaders,
          stripPrefix: def.stripPrefix,
        })
      )
    );
  }

  ignoredPaths(): readonly string[] {
    return this.ignored;
  }

  routes(): readonly Route[] {
    return this.resolved;
  }

  /**
   * Resolves a request path to the route that serves it, with `path` set to
   * what the upstream should receive and `prefix` to what was removed.
   */
  matchingRoute(path: string): Route | undefined {
    if (this.ignored.some((pattern) => matches(pattern, path))) return undefined;

    const prefixed = this.prefix !== '' && path.startsWith(this.prefix + '/');
    const adjusted = prefixed ? path.slice(this.prefix.length) : path;

    const order = comparator(adjusted);
    const def = this.byPath
      .filter((candidate) => matches(candidate.path, adjusted))
      .sort((a, b) => order(a.path, b.path))[0];
    if (def === undefined) return undefined;

    // `kept` stays on the forwarded path, `removed` becomes the route prefix.
    const kept = prefixed && !this.stripPrefix ? this.prefix : '';
    let removed = prefixed && this.stripPrefix ? this.prefix : '';
    let rest = adjusted;
    const stripRoute = def.stripPrefix ?? true;
    const routePrefix = routePrefixOf(def.path);
    if (stripRoute && routePrefix !== '' && rest.startsWith(routePrefix)) {
      rest = rest.slice(routePrefix.length);
      removed += routePrefix;
    }

    return createRoute({
      id: def.id,
      path: kept + rest,
      location: this.locationOf(def),
      prefix: removed,
      retryable: def.retryable ?? this.retryable,
      sensitiveHeaders: def.sensitiveHeaders,
      defaultSensitiveHeaders: this.sensitiveHeaders,
      stripPrefix: stripRoute,
    });
  }

  private locationOf(def: RouteDefinition): string {
    return def.url ?? def.serviceId ?? def.id;
  }
}
