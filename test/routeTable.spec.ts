import { describe, it, expect, vi } from 'vitest';
import { RouteTable, type SkipListener } from '../src/routeTable.js';
import { route } from './fakes.js';

const handler = { name: 'proxy' };

describe('RouteTable', () => {
  it('starts empty', () => {
    const table = RouteTable.empty<typeof handler>();
    expect(table.size).toBe(0);
    expect(table.lookup('/anything')).toBeUndefined();
  });

  it('binds every route to the shared handler', () => {
    const table = RouteTable.build([route('orders', '/orders/**'), route('users', '/users/**')], handler);
    expect(table.size).toBe(2);
    const entry = table.lookup('/users/9');
    expect(entry?.handler).toBe(handler);
    expect(entry?.route.id).toBe('users');
    expect(entry?.pattern).toBe('/users/**');
  });

  it('resolves the most specific pattern', () => {
    const table = RouteTable.build(
      [route('all', '/api/**'), route('any-user', '/api/users/*'), route('user-42', '/api/users/42')],
      handler
    );
    expect(table.lookup('/api/users/42')?.route.id).toBe('user-42');
    expect(table.lookup('/api/users/7')?.route.id).toBe('any-user');
    expect(table.lookup('/api/other')?.route.id).toBe('all');
    expect(table.lookup('/elsewhere')).toBeUndefined();
  });

  it('lets the later of two routes with the same fullPath win', () => {
    const table = RouteTable.build([route('first', '/dup/**'), route('second', '/dup/**')], handler);
    expect(table.size).toBe(1);
    expect(table.lookup('/dup/x')?.route.id).toBe('second');
  });

  it('breaks specificity ties by route order', () => {
    const table = RouteTable.build([route('left', '/x/?'), route('right', '/?/y')], handler);
    expect(table.lookup('/x/y')?.route.id).toBe('left');
  });

  it('skips malformed patterns and keeps the rest', () => {
    const onSkip = vi.fn<SkipListener>();
    const table = RouteTable.build(
      [route('bad', 'no-slash/**'), route('good', '/good/**'), route('worse', '/a***')],
      handler,
      onSkip
    );
    expect(table.size).toBe(1);
    expect(table.lookup('/good/1')?.route.id).toBe('good');
    expect(onSkip).toHaveBeenCalledTimes(2);
    expect(onSkip.mock.calls.map(([r]) => r.id)).toEqual(['bad', 'worse']);
  });

  it('is frozen once built', () => {
    const table = RouteTable.build([route('orders', '/orders/**')], handler);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.lookup('/orders/1'))).toBe(true);
  });
});
