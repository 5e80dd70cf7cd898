/**
 * Middleware Layer
 *
 * Composes independently written middleware units around the view
 * (onion model): request-side hooks run outermost first, response-side
 * hooks innermost first.
 */

export {
  constructed,
  notUsed,
  failed,
  defineMiddleware,
  fromClass,
  type MiddlewareUnit,
  type MiddlewareFactory,
  type MiddlewareDefinition,
  type ConstructionResult,
  type HookResult,
} from './types.ts';
export {
  HOOKS,
  HOOK_METHODS,
  describeUnit,
  type HookName,
  type MiddlewareDescriptor,
} from './capabilities.ts';
export {
  MiddlewareRegistry,
  type RegistryOptions,
  type RegisteredMiddleware,
  type OmittedMiddleware,
} from './registry.ts';
export { MiddlewareCatalog } from './catalog.ts';
export { Chain, buildChain, type ChainLink } from './chain.ts';
export { Dispatcher, type DispatcherOptions, type ResponseOrigin } from './dispatcher.ts';
export {
  StrataError,
  ConstructionError,
  PipelineFault,
  InvalidHookReturn,
  UnhandledViewError,
  HookFailure,
  PipelineErrorCodes,
  describeValue,
  type PipelineErrorCode,
} from './errors.ts';
