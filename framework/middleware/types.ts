/**
 * Middleware Types
 *
 * A middleware unit implements any subset of five hooks. Request-side hooks
 * (`processRequest`, `processView`) run outermost first; response-side hooks
 * (`processException`, `processTemplateResponse`, `processResponse`) run
 * innermost first.
 *
 * Units are shared by every request and frozen at registration. Keep
 * per-request data on the request (see `createSlot`) or in local variables.
 */

import type { HttpRequest } from '../http/request.ts';
import type { TemplateResponse } from '../http/response.ts';
import type {
  Awaitable,
  PipelineResponse,
  RenderedResponse,
  ViewArgs,
  ViewHandler,
  ViewKwargs,
} from '../http/types.ts';

/**
 * Outcome of a request-side hook: nothing to continue, a response to short-circuit
 */
export type HookResult = PipelineResponse | null | undefined | void;

export interface MiddlewareUnit {
  /** Name used in logs and errors; defaults to the registered name */
  readonly name?: string;

  processRequest?(request: HttpRequest): Awaitable<HookResult>;

  processView?(
    request: HttpRequest,
    handler: ViewHandler,
    args: ViewArgs,
    kwargs: ViewKwargs
  ): Awaitable<HookResult>;

  processException?(request: HttpRequest, error: unknown): Awaitable<HookResult>;

  processTemplateResponse?(request: HttpRequest, response: TemplateResponse): Awaitable<TemplateResponse>;

  processResponse?(request: HttpRequest, response: RenderedResponse): Awaitable<RenderedResponse>;
}

/**
 * Result of constructing a unit
 */
export type ConstructionResult =
  | { readonly kind: 'constructed'; readonly unit: MiddlewareUnit }
  | { readonly kind: 'not-used'; readonly reason: string }
  | { readonly kind: 'failed'; readonly error: unknown };

/**
 * Builds a unit with no arguments. It may read settings through getConfig().
 */
export type MiddlewareFactory = () => ConstructionResult;

export interface MiddlewareDefinition {
  readonly name: string;
  readonly create: MiddlewareFactory;
}

export function constructed(unit: MiddlewareUnit): ConstructionResult {
  return { kind: 'constructed', unit };
}

/**
 * Opt out of the pipeline (e.g. a feature disabled in config)
 */
export function notUsed(reason: string): ConstructionResult {
  return { kind: 'not-used', reason };
}

export function failed(error: unknown): ConstructionResult {
  return { kind: 'failed', error };
}

/**
 * Define a named middleware factory
 *
 * @example
 * ```ts
 * const poweredBy = defineMiddleware('powered-by', () =>
 *   constructed({
 *     processResponse(_request, response) {
 *       return response.setHeader('X-Powered-By', 'strata');
 *     },
 *   })
 * );
 * ```
 */
export function defineMiddleware(name: string, create: MiddlewareFactory): MiddlewareDefinition {
  return { name, create };
}

/**
 * Define a middleware from a class with a no-argument constructor
 */
export function fromClass(name: string, unitClass: new () => MiddlewareUnit): MiddlewareDefinition {
  return defineMiddleware(name, () => constructed(new unitClass()));
}
