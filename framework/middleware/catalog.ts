/**
 * Middleware Catalog
 *
 * Maps the identifiers used in configuration to middleware factories.
 * Identifiers are resolved once, when the registry is created.
 */

import { ConstructionError } from './errors.ts';
import type { MiddlewareDefinition, MiddlewareFactory } from './types.ts';

export class MiddlewareCatalog {
  private readonly factories = new Map<string, MiddlewareFactory>();

  constructor(definitions: readonly MiddlewareDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition.name, definition.create);
    }
  }

  /**
   * Register a factory under an identifier
   */
  register(id: string, create: MiddlewareFactory): this {
    if (this.factories.has(id)) {
      throw new ConstructionError(id, 'identifier is already registered');
    }
    this.factories.set(id, create);
    return this;
  }

  /**
   * Resolve an identifier to a definition
   */
  resolve(id: string): MiddlewareDefinition {
    const create = this.factories.get(id);
    if (!create) {
      throw new ConstructionError(id, 'unknown middleware identifier');
    }
    return { name: id, create };
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  get names(): string[] {
    return Array.from(this.factories.keys());
  }
}
