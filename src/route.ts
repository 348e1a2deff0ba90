export const DEFAULT_SENSITIVE_HEADERS: readonly string[] = ['cookie', 'set-cookie', 'authorization'];

/**
 * One routing rule, resolved. Instances are frozen: a route table generation
 * hands the same object to every reader.
 */
export interface Route {
  readonly id: string;
  /** `prefix + path`; the key the route is registered under in a table. */
  readonly fullPath: string;
  readonly path: string;
  /** Service id for the resolver, or a literal http(s) URL. */
  readonly location: string;
  readonly prefix: string;
  readonly retryable: boolean;
  readonly customSensitiveHeaders: boolean;
  readonly sensitiveHeaders: ReadonlySet<string>;
  readonly stripPrefix: boolean;
}

export interface RouteInit {
  id: string;
  path: string;
  location: string;
  prefix?: string;
  retryable?: boolean;
  sensitiveHeaders?: Iterable<string>;
  /** Used when the route declares no `sensitiveHeaders` of its own. */
  defaultSensitiveHeaders?: Iterable<string>;
  stripPrefix?: boolean;
}

export function createRoute(init: RouteInit): Route {
  const prefix = init.prefix ?? '';
  const custom = init.sensitiveHeaders !== undefined;
  const headers = Array.from(init.sensitiveHeaders ?? init.defaultSensitiveHeaders ?? DEFAULT_SENSITIVE_HEADERS);
  return Object.freeze({
    id: init.id,
    fullPath: prefix + init.path,
    path: init.path,
    location: init.location,
    prefix,
    retryable: init.retryable ?? false,
    customSensitiveHeaders: custom,
    sensitiveHeaders: new Set(headers.map((h) => h.toLowerCase())),
    stripPrefix: init.stripPrefix ?? true,
  });
}

export function isUrlLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}
