/**
 * Permission Registry
 *
 * Immutable (method, route pattern) -> (resource, action) table built from
 * the route declarations themselves, so a route and its permission cannot
 * drift apart. Routes without an entry are public.
 */

import type { PermissionRequirement } from '../types/index.js';
import { ConfigurationError } from '../core/errors.js';

export interface PermissionDeclaration {
  method: string;
  url: string;
  permission?: PermissionRequirement;
}

export interface PermissionEntry {
  method: string;
  url: string;
  requirement: PermissionRequirement;
}

const keyOf = (method: string, url: string): string => `${method.toUpperCase()} ${url}`;

export class PermissionRegistry {
  private readonly entries: ReadonlyMap<string, PermissionEntry>;

  private constructor(entries: Map<string, PermissionEntry>) {
    this.entries = entries;
    Object.freeze(this);
  }

  /**
   * Build the registry from route declarations. Duplicate declarations are
   * a configuration error.
   */
  static fromRoutes(routes: readonly PermissionDeclaration[]): PermissionRegistry {
    const entries = new Map<string, PermissionEntry>();
    const seen = new Set<string>();

    for (const route of routes) {
      const key = keyOf(route.method, route.url);
      if (seen.has(key)) {
        throw new ConfigurationError(`Route ${key} is declared twice`);
      }
      seen.add(key);

      if (route.permission) {
        entries.set(key, {
          method: route.method.toUpperCase(),
          url: route.url,
          requirement: Object.freeze({ ...route.permission }),
        });
      }
    }

    return new PermissionRegistry(entries);
  }

  /**
   * Requirement for a route pattern, or null when the route is public
   */
  lookup(method: string, url: string): PermissionRequirement | null {
    return this.entries.get(keyOf(method, url))?.requirement ?? null;
  }

  list(): PermissionEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }
}
