import { describe, it, expect } from 'vitest';
import type { RouteDefinition } from '../src/config.js';
import { StaticRouteSource } from '../src/staticRouteSource.js';

const definitions: RouteDefinition[] = [
  { id: 'orders', path: '/orders/**', serviceId: 'order-service' },
  { id: 'users', path: '/users/**', serviceId: 'user-service', sensitiveHeaders: ['Cookie'] },
  { id: 'legacy', path: '/legacy/**', url: 'http://legacy.internal:8080', stripPrefix: false, retryable: true },
  { id: 'search', path: '/search' },
];

function source(overrides: Partial<ConstructorParameters<typeof StaticRouteSource>[0]> = {}) {
  return new StaticRouteSource({
    routes: definitions,
    ignoredPatterns: ['/api/admin/**'],
    prefix: '/api',
    ...overrides,
  });
}

describe('StaticRouteSource', () => {
  it('registers routes under prefix + path, in order', () => {
    expect(source().routes().map((r) => r.fullPath)).toEqual([
      '/api/orders/**',
      '/api/users/**',
      '/api/legacy/**',
      '/api/search',
    ]);
  });

  it('uses the route id as location when neither serviceId nor url is given', () => {
    expect(source().routes()[3].location).toBe('search');
  });

  it('exposes the ignored patterns', () => {
    expect(source().ignoredPaths()).toEqual(['/api/admin/**']);
  });

  it('strips the shared prefix and the route prefix', () => {
    const route = source().matchingRoute('/api/orders/42');
    expect(route).toMatchObject({
      id: 'orders',
      path: '/42',
      prefix: '/api/orders',
      fullPath: '/api/orders/42',
      location: 'order-service',
      retryable: false,
      stripPrefix: true,
      customSensitiveHeaders: false,
    });
    expect([...(route?.sensitiveHeaders ?? [])]).toEqual(['cookie', 'set-cookie', 'authorization']);
  });

  it('keeps the route prefix when the route does not strip', () => {
    const route = source().matchingRoute('/api/legacy/x/y');
    expect(route).toMatchObject({
      id: 'legacy',
      path: '/legacy/x/y',
      prefix: '/api',
      location: 'http://legacy.internal:8080',
      retryable: true,
      stripPrefix: false,
    });
  });

  it('keeps the shared prefix when global stripping is off', () => {
    const route = source({ stripPrefix: false }).matchingRoute('/api/orders/42');
    expect(route?.path).toBe('/api/42');
    expect(route?.prefix).toBe('/orders');
  });

  it('resolves literal routes without touching the path', () => {
    const route = source().matchingRoute('/api/search');
    expect(route?.path).toBe('/search');
    expect(route?.prefix).toBe('/api');
  });

  it('uses route-specific sensitive headers, lower-cased', () => {
    const route = source().matchingRoute('/api/users/me');
    expect(route?.customSensitiveHeaders).toBe(true);
    expect([...(route?.sensitiveHeaders ?? [])]).toEqual(['cookie']);
  });

  it('falls back to the configured sensitive headers', () => {
    const route = source({ sensitiveHeaders: ['X-Api-Key'] }).matchingRoute('/api/orders/1');
    expect(route?.customSensitiveHeaders).toBe(false);
    expect([...(route?.sensitiveHeaders ?? [])]).toEqual(['x-api-key']);
  });

  it('applies the global retryable default', () => {
    expect(source({ retryable: true }).matchingRoute('/api/orders/1')?.retryable).toBe(true);
  });

  it('returns nothing for ignored or unknown paths', () => {
    expect(source().matchingRoute('/api/admin/users')).toBeUndefined();
    expect(source().matchingRoute('/api/nothing')).toBeUndefined();
  });

  it('picks the most specific definition', () => {
    const src = new StaticRouteSource({
      routes: [
        { id: 'all', path: '/**', url: 'http://fallback.internal' },
        { id: 'one', path: '/orders/*', serviceId: 'order-service' },
      ],
    });
    expect(src.matchingRoute('/orders/1')?.id).toBe('one');
    expect(src.matchingRoute('/other')?.id).toBe('all');
  });

  it('resolves a repeated path to the last definition, like the route table', () => {
    const src = new StaticRouteSource({
      routes: [
        { id: 'first', path: '/dup/**', url: 'http://first.internal' },
        { id: 'second', path: '/dup/**', url: 'http://second.internal' },
      ],
    });
    expect(src.routes().map((r) => r.id)).toEqual(['first', 'second']);
    expect(src.matchingRoute('/dup/x')).toMatchObject({ id: 'second', location: 'http://second.internal', path: '/x' });
  });
});
