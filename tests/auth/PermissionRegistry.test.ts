/**
 * Permission registry tests
 */

import { describe, it, expect } from 'vitest';
import { PermissionRegistry } from '../../src/auth/index.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('PermissionRegistry', () => {
  const registry = PermissionRegistry.fromRoutes([
    { method: 'POST', url: '/tasks', permission: { resource: 'task', action: 'create' } },
    { method: 'get', url: '/tasks/:id/status', permission: { resource: 'task', action: 'read' } },
    { method: 'GET', url: '/health' },
  ]);

  it('should look up requirements by method and route pattern', () => {
    expect(registry.lookup('POST', '/tasks')).toEqual({ resource: 'task', action: 'create' });
    expect(registry.lookup('GET', '/tasks/:id/status')).toEqual({ resource: 'task', action: 'read' });
  });

  it('should treat undeclared and permission-less routes as public', () => {
    expect(registry.lookup('GET', '/health')).toBeNull();
    expect(registry.lookup('DELETE', '/tasks')).toBeNull();
    expect(registry.size).toBe(2);
  });

  it('should list protected routes', () => {
    expect(registry.list().map((entry) => `${entry.method} ${entry.url}`)).toEqual([
      'POST /tasks',
      'GET /tasks/:id/status',
    ]);
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.lookup('POST', '/tasks'))).toBe(true);
  });

  it('should reject duplicate declarations', () => {
    expect(() =>
      PermissionRegistry.fromRoutes([
        { method: 'GET', url: '/tasks' },
        { method: 'get', url: '/tasks' },
      ])
    ).toThrow(ConfigurationError);
  });
});
