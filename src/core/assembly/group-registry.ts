/**
 * Route groups declared through `@Group`. The first route naming a group
 * registers it; later routes reuse that definition.
 */
import type { GroupInfo } from '../../runtime/contract.js';

export class GroupRegistry {
  private groups = new Map<string, GroupInfo>();

  get(name: string): GroupInfo | undefined {
    return this.groups.get(name);
  }

  /**
   * Register a group, replacing any existing one with the same name.
   * The prefix is stored with one leading slash and no trailing slash.
   */
  register(name: string, prefix: string, description: string): GroupInfo {
    const group: GroupInfo = { name, prefix: normalizePrefix(prefix), description };
    this.groups.set(name, group);
    return group;
  }

  all(): GroupInfo[] {
    return Array.from(this.groups.values());
  }

  /**
   * Mainly for testing.
   */
  clear(): void {
    this.groups.clear();
  }
}

/**
 * `api/` and `/api/` become `/api`; an empty prefix becomes `/`.
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/^\/+|\/+$/g, '');
  return trimmed === '' ? '/' : `/${trimmed}`;
}

/**
 * Prepend a normalized prefix to a route path unless the path already
 * lies under it. Matching is by whole segments, so `/api` does not
 * cover `/apiary`.
 */
export function applyPrefix(prefix: string, routePath: string): string {
  if (prefix === '/' || routePath === prefix || routePath.startsWith(`${prefix}/`)) {
    return routePath;
  }
  return routePath.startsWith('/') ? prefix + routePath : `${prefix}/${routePath}`;
}
