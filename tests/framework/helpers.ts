/**
 * Test helpers
 */

import { HttpRequest } from '../../framework/http/request.ts';
import type { PipelineResponse, ViewDescriptor } from '../../framework/http/types.ts';
import { buildChain } from '../../framework/middleware/chain.ts';
import { Dispatcher } from '../../framework/middleware/dispatcher.ts';
import { MiddlewareRegistry } from '../../framework/middleware/registry.ts';
import {
  constructed,
  defineMiddleware,
  type MiddlewareDefinition,
  type MiddlewareUnit,
} from '../../framework/middleware/types.ts';
import { createSilentLogger } from '../../framework/telemetry/logger.ts';

/**
 * A unit that records each hook call as "<name>.<hook>" and otherwise
 * continues (request-side hooks) or passes the response through.
 * `overrides` replace the behavior, after the call is recorded.
 */
export function recordingUnit(
  name: string,
  calls: string[],
  overrides: Omit<MiddlewareUnit, 'name'> = {}
): MiddlewareDefinition {
  return defineMiddleware(name, () =>
    constructed({
      processRequest(request) {
        calls.push(`${name}.request`);
        return overrides.processRequest?.(request);
      },
      processView(request, handler, args, kwargs) {
        calls.push(`${name}.view`);
        return overrides.processView?.(request, handler, args, kwargs);
      },
      processException(request, error) {
        calls.push(`${name}.exception`);
        return overrides.processException?.(request, error);
      },
      processTemplateResponse(request, response) {
        calls.push(`${name}.templateResponse`);
        return overrides.processTemplateResponse ? overrides.processTemplateResponse(request, response) : response;
      },
      processResponse(request, response) {
        calls.push(`${name}.response`);
        return overrides.processResponse ? overrides.processResponse(request, response) : response;
      },
    })
  );
}

/**
 * Registry, chain and dispatcher over the given definitions
 */
export function createDispatcher(definitions: readonly MiddlewareDefinition[]): Dispatcher {
  const logger = createSilentLogger();
  const registry = new MiddlewareRegistry(definitions, { logger });
  return new Dispatcher(buildChain(registry), { logger });
}

/**
 * A view that records "view()" and returns `response`
 */
export function recordingView(calls: string[], response: PipelineResponse): ViewDescriptor {
  return {
    handler: () => {
      calls.push('view()');
      return response;
    },
  };
}

export function createRequest(path = '/', init?: RequestInit): HttpRequest {
  return new HttpRequest(new Request(`http://localhost${path}`, init));
}
