/**
 * Middleware Registry
 *
 * Constructs the configured units, in order, exactly once. Units that opt
 * out are omitted; a failed construction aborts the whole build.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';
import { describeUnit, type MiddlewareDescriptor } from './capabilities.ts';
import type { MiddlewareCatalog } from './catalog.ts';
import { ConstructionError } from './errors.ts';
import type { ConstructionResult, MiddlewareDefinition, MiddlewareUnit } from './types.ts';

export interface RegisteredMiddleware {
  readonly unit: MiddlewareUnit;
  readonly descriptor: MiddlewareDescriptor;
}

export interface OmittedMiddleware {
  readonly name: string;
  readonly reason: string;
}

export interface RegistryOptions {
  /** Log omitted units at debug level */
  verbose?: boolean;
  logger?: Logger;
  /** Freeze each unit instance; on by default */
  freezeUnits?: boolean;
}

export class MiddlewareRegistry {
  private readonly definitions: readonly MiddlewareDefinition[];
  private readonly verbose: boolean;
  private readonly logger: Logger;
  private readonly freezeUnits: boolean;
  private built: readonly RegisteredMiddleware[] | null = null;
  private buildError: ConstructionError | null = null;
  private _omitted: readonly OmittedMiddleware[] = Object.freeze([]);

  constructor(definitions: readonly MiddlewareDefinition[], options: RegistryOptions = {}) {
    this.definitions = [...definitions];
    this.verbose = options.verbose ?? false;
    this.logger = (options.logger ?? getLogger()).child({ component: 'middleware-registry' });
    this.freezeUnits = options.freezeUnits ?? true;
  }

  /**
   * Resolve configured identifiers through a catalog
   */
  static fromCatalog(
    ids: readonly string[],
    catalog: MiddlewareCatalog,
    options?: RegistryOptions
  ): MiddlewareRegistry {
    return new MiddlewareRegistry(
      ids.map((id) => catalog.resolve(id)),
      options
    );
  }

  /**
   * Build the ordered unit list. Later calls return the same frozen list, or
   * rethrow the same ConstructionError.
   */
  build(): readonly RegisteredMiddleware[] {
    if (this.buildError) {
      throw this.buildError;
    }
    if (!this.built) {
      try {
        this.built = this.construct();
      } catch (error) {
        this.buildError =
          error instanceof ConstructionError
            ? error
            : new ConstructionError('<registry>', 'registry build failed', { cause: error });
        throw this.buildError;
      }
    }
    return this.built;
  }

  get isBuilt(): boolean {
    return this.built !== null;
  }

  /**
   * Units that opted out, once the build has succeeded
   */
  get omitted(): readonly OmittedMiddleware[] {
    return this._omitted;
  }

  /**
   * Configured names, including ones that may opt out
   */
  get configuredNames(): readonly string[] {
    return this.definitions.map((definition) => definition.name);
  }

  private construct(): readonly RegisteredMiddleware[] {
    const registered: RegisteredMiddleware[] = [];
    const omitted: OmittedMiddleware[] = [];

    for (const definition of this.definitions) {
      let result: ConstructionResult;
      try {
        result = definition.create();
      } catch (error) {
        throw new ConstructionError(definition.name, describeCause(error), { cause: error });
      }

      switch (result.kind) {
        case 'constructed': {
          const unit = this.freezeUnits ? Object.freeze(result.unit) : result.unit;
          registered.push(
            Object.freeze({
              unit,
              descriptor: describeUnit(unit, definition.name, registered.length),
            })
          );
          break;
        }
        case 'not-used':
          omitted.push(Object.freeze({ name: definition.name, reason: result.reason }));
          if (this.verbose) {
            this.logger.debug(`Middleware ${definition.name} omitted`, { reason: result.reason });
          }
          break;
        case 'failed':
          throw new ConstructionError(definition.name, describeCause(result.error), { cause: result.error });
      }
    }

    this._omitted = Object.freeze(omitted);
    return Object.freeze(registered);
  }
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
