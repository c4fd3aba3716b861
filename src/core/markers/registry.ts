/**
 * Registry of comment markers the compiler recognizes.
 *
 * Callers own their registry instance; the pipeline takes one as an
 * option and falls back to `createDefaultMarkerRegistry()`.
 */
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import type { MarkerDefinition } from './types.js';

const MARKER_NAME = /^[A-Z][A-Za-z0-9]*$/;

export class MarkerRegistry {
  private definitions = new Map<string, MarkerDefinition>();

  /**
   * Register a marker. A definition with the same name is replaced.
   */
  register(definition: MarkerDefinition): void {
    if (!MARKER_NAME.test(definition.name)) {
      throw new RegistryError(
        ErrorCodes.INVALID_MARKER_DEFINITION,
        `Invalid marker name '${definition.name}': must start with an upper-case letter`,
        { name: definition.name }
      );
    }
    if ((definition.role === 'behavior' || definition.role === 'websocket') && !definition.factory) {
      throw new RegistryError(
        ErrorCodes.INVALID_MARKER_DEFINITION,
        `Marker '${definition.name}' has role '${definition.role}' but no factory`,
        { name: definition.name, role: definition.role }
      );
    }
    const { min, max } = definition.arity;
    if (min < 0 || (max !== undefined && max < min)) {
      throw new RegistryError(
        ErrorCodes.INVALID_MARKER_DEFINITION,
        `Marker '${definition.name}' has an invalid arity`,
        { name: definition.name, min, max }
      );
    }

    this.definitions.set(definition.name, definition);
  }

  lookup(name: string): MarkerDefinition | undefined {
    return this.definitions.get(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /**
   * All definitions in registration order.
   */
  all(): MarkerDefinition[] {
    return Array.from(this.definitions.values());
  }

  names(): string[] {
    return Array.from(this.definitions.keys());
  }

  get size(): number {
    return this.definitions.size;
  }

  /**
   * Remove every definition. Mainly for testing.
   */
  clear(): void {
    this.definitions.clear();
  }
}
