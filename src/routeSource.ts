import type { Route } from './route.js';

/**
 * Supplies routes to the dispatch engine. `routes()` order is significant:
 * among equally specific patterns the earlier route wins.
 *
 * Sources backed by something that changes at runtime implement `refresh()`;
 * the engine awaits it before every table rebuild.
 */
export interface RouteSource {
  ignoredPaths(): readonly string[];
  routes(): readonly Route[];
  matchingRoute(path: string): Route | undefined;
  refresh?(): Promise<void>;
}

export interface RefreshableRouteSource extends RouteSource {
  refresh(): Promise<void>;
}
