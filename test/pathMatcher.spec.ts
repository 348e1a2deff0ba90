import { describe, it, expect } from 'vitest';
import { PatternError } from '../src/errors.js';
import { comparator, isPattern, matches, validatePattern } from '../src/pathMatcher.js';

describe('matches', () => {
  it('matches literal paths exactly', () => {
    expect(matches('/health', '/health')).toBe(true);
    expect(matches('/health', '/healthz')).toBe(false);
    expect(matches('/health', '/health/deep')).toBe(false);
  });

  it('treats ? as exactly one character', () => {
    expect(matches('/v?/items', '/v1/items')).toBe(true);
    expect(matches('/v?/items', '/v10/items')).toBe(false);
    expect(matches('/v?/items', '/v/items')).toBe(false);
  });

  it('keeps * inside one segment', () => {
    expect(matches('/api/users/*', '/api/users/42')).toBe(true);
    expect(matches('/api/users/*', '/api/users/42/orders')).toBe(false);
    expect(matches('/files/*.json', '/files/report.json')).toBe(true);
    expect(matches('/files/*.json', '/files/report.xml')).toBe(false);
  });

  it('lets ** span any number of segments', () => {
    expect(matches('/api/**', '/api/other')).toBe(true);
    expect(matches('/api/**', '/api/users/42/orders')).toBe(true);
    expect(matches('/api/**', '/apix/users')).toBe(false);
    expect(matches('/**/health', '/a/b/health')).toBe(true);
    expect(matches('/**/health', '/health')).toBe(true);
  });

  it('matches the bare prefix of a trailing /**', () => {
    expect(matches('/orders/**', '/orders')).toBe(true);
  });

  it('finds literal runs between two ** segments', () => {
    expect(matches('/**/admin/**', '/x/y/admin/panel')).toBe(true);
    expect(matches('/**/admin/**', '/x/y/panel')).toBe(false);
    expect(matches('/a/**/b/c/**/d', '/a/x/b/c/y/z/d')).toBe(true);
    expect(matches('/a/**/b/c/**/d', '/a/x/b/y/c/d')).toBe(false);
  });

  it('treats regex metacharacters in segments literally', () => {
    expect(matches('/price/$1.00', '/price/$1.00')).toBe(true);
    expect(matches('/v1.*', '/v1.2')).toBe(true);
    expect(matches('/v1.*', '/v1x2')).toBe(false);
  });

  it('requires both sides to agree on a leading slash', () => {
    expect(matches('/orders/**', 'orders/1')).toBe(false);
  });

  it('respects a trailing slash on fully literal matches', () => {
    expect(matches('/docs/', '/docs/')).toBe(true);
    expect(matches('/docs', '/docs/')).toBe(false);
    expect(matches('/docs/*', '/docs/')).toBe(true);
  });
});

describe('isPattern', () => {
  it('detects wildcards', () => {
    expect(isPattern('/a/*')).toBe(true);
    expect(isPattern('/a/?')).toBe(true);
    expect(isPattern('/a/b')).toBe(false);
  });
});

describe('validatePattern', () => {
  it('accepts well-formed patterns', () => {
    expect(() => validatePattern('/orders/**')).not.toThrow();
    expect(() => validatePattern('/a/*/b?')).not.toThrow();
    expect(() => validatePattern('/')).not.toThrow();
  });

  it.each([
    ['', 'pattern is empty'],
    ['orders/**', 'pattern must start with "/"'],
    ['/orders /**', 'pattern contains whitespace or control characters'],
    ['/orders/***', '"***" is not a wildcard'],
    ['/orders**', '"**" must be a whole segment, got "orders**"'],
  ])('rejects %j', (pattern, reason) => {
    expect(() => validatePattern(pattern)).toThrow(PatternError);
    expect(() => validatePattern(pattern)).toThrow(`Malformed path pattern "${pattern}": ${reason}`);
  });
});

describe('comparator', () => {
  const sortFor = (path: string, patterns: string[]) => [...patterns].sort(comparator(path));

  it('puts the exact match first', () => {
    expect(sortFor('/api/users/42', ['/api/**', '/api/users/*', '/api/users/42'])).toEqual([
      '/api/users/42',
      '/api/users/*',
      '/api/**',
    ]);
  });

  it('ranks a single-segment wildcard over a prefix pattern', () => {
    expect(sortFor('/api/users/7', ['/api/**', '/api/users/*'])).toEqual(['/api/users/*', '/api/**']);
  });

  it('puts the catch-all last', () => {
    expect(sortFor('/a/b', ['/**', '/a/**'])).toEqual(['/a/**', '/**']);
  });

  it('prefers the longer pattern when wildcard counts tie', () => {
    expect(sortFor('/a/b/c', ['/a/**', '/a/b/**'])).toEqual(['/a/b/**', '/a/**']);
  });

  it('prefers fewer wildcards', () => {
    expect(sortFor('/a/b/c', ['/*/*/c', '/a/*/c'])).toEqual(['/a/*/c', '/*/*/c']);
  });

  it('keeps equally specific patterns in their original order', () => {
    expect(sortFor('/x/y', ['/x/?', '/?/y'])).toEqual(['/x/?', '/?/y']);
  });
});
