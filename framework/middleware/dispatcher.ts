/**
 * Dispatcher
 *
 * Runs one request through the chain:
 *
 * 1. request hooks, outermost first; a response skips to step 5
 * 2. view hooks, outermost first; a response skips to step 5
 * 3. the view; if it throws, exception hooks run innermost first until one
 *    returns a response, otherwise the request fails with UnhandledViewError
 * 4. template-response hooks, innermost first, then a single render step
 *    (deferred responses only)
 * 5. response hooks, innermost first, for every unit in the chain
 *
 * A hook that throws fails the request with HookFailure; the rest of the
 * chain is not run.
 */

import type { HttpRequest } from '../http/request.ts';
import { isPipelineResponse, isRenderedResponse, TemplateResponse } from '../http/response.ts';
import type { PipelineResponse, RenderedResponse, ViewDescriptor } from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpan } from '../telemetry/otel.ts';
import type { HookName } from './capabilities.ts';
import type { Chain, ChainLink } from './chain.ts';
import { describeValue, HookFailure, InvalidHookReturn, UnhandledViewError } from './errors.ts';

export interface DispatcherOptions {
  logger?: Logger;
}

/**
 * Where the response came from
 */
export type ResponseOrigin = 'request' | 'view-hook' | 'view' | 'exception';

interface Produced {
  response: PipelineResponse;
  origin: ResponseOrigin;
}

const EMPTY_ARGS: readonly unknown[] = Object.freeze([]);
const EMPTY_KWARGS: Readonly<Record<string, unknown>> = Object.freeze({});

export class Dispatcher {
  private readonly logger: Logger;

  constructor(
    readonly chain: Chain,
    options: DispatcherOptions = {}
  ) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'dispatcher' });
  }

  /**
   * Produce the final response for a request
   */
  dispatch(request: HttpRequest, view: ViewDescriptor): Promise<RenderedResponse> {
    const attributes = {
      'http.request.method': request.method,
      'url.path': request.path,
      'strata.chain.length': this.chain.length,
    };

    return withSpan('strata.dispatch', attributes, async (span) => {
      const { response, origin } = await this.produce(request, view);
      span.setAttribute('strata.response.origin', origin);
      if (origin === 'request' || origin === 'view-hook') {
        span.setAttribute('strata.short_circuit', origin);
      }

      const rendered = await this.unwind(request, response);
      span.setAttribute('strata.response.kind', rendered.kind);
      return rendered;
    });
  }

  private async produce(request: HttpRequest, view: ViewDescriptor): Promise<Produced> {
    for (const link of this.chain.forHook('request')) {
      const response = await this.optionalResponse(link, 'request', () => link.unit.processRequest?.(request));
      if (response) {
        this.logger.debug('Request phase short-circuited', { unit: link.descriptor.name, path: request.path });
        return { response, origin: 'request' };
      }
    }

    const args = view.args ?? EMPTY_ARGS;
    const kwargs = view.kwargs ?? EMPTY_KWARGS;

    for (const link of this.chain.forHook('view')) {
      const response = await this.optionalResponse(link, 'view', () =>
        link.unit.processView?.(request, view.handler, args, kwargs)
      );
      if (response) {
        this.logger.debug('View phase short-circuited', { unit: link.descriptor.name, path: request.path });
        return { response, origin: 'view-hook' };
      }
    }

    let result: unknown;
    try {
      result = await view.handler(request, args, kwargs);
    } catch (error) {
      return { response: await this.recover(request, error), origin: 'exception' };
    }

    if (!isPipelineResponse(result)) {
      throw new InvalidHookReturn(view.handler.name || 'view', 'view-handler', describeValue(result));
    }
    return { response: result, origin: 'view' };
  }

  private async recover(request: HttpRequest, error: unknown): Promise<PipelineResponse> {
    for (const link of this.chain.forHook('exception')) {
      const response = await this.optionalResponse(link, 'exception', () =>
        link.unit.processException?.(request, error)
      );
      if (response) {
        this.logger.debug('View error handled', { unit: link.descriptor.name, path: request.path });
        return response;
      }
    }

    throw new UnhandledViewError(error);
  }

  private async unwind(request: HttpRequest, response: PipelineResponse): Promise<RenderedResponse> {
    let rendered: RenderedResponse;

    if (response.kind === 'deferred') {
      let deferred = response;
      for (const link of this.chain.forHook('templateResponse')) {
        const result = await this.invoke(link, 'templateResponse', () =>
          link.unit.processTemplateResponse?.(request, deferred)
        );
        if (!(result instanceof TemplateResponse)) {
          throw new InvalidHookReturn(link.descriptor.name, 'templateResponse', describeValue(result));
        }
        deferred = result;
      }
      rendered = await deferred.render();
    } else {
      rendered = response;
    }

    for (const link of this.chain.forHook('response')) {
      const current = rendered;
      const result = await this.invoke(link, 'response', () => link.unit.processResponse?.(request, current));
      if (!isRenderedResponse(result)) {
        throw new InvalidHookReturn(link.descriptor.name, 'response', describeValue(result));
      }
      rendered = result;
    }

    return rendered;
  }

  /**
   * Run a request-side or exception hook; null means continue
   */
  private async optionalResponse(
    link: ChainLink,
    hook: HookName,
    call: () => unknown
  ): Promise<PipelineResponse | null> {
    const result = await this.invoke(link, hook, call);
    if (result === undefined || result === null) {
      return null;
    }
    if (!isPipelineResponse(result)) {
      throw new InvalidHookReturn(link.descriptor.name, hook, describeValue(result));
    }
    return result;
  }

  private async invoke(link: ChainLink, hook: HookName, call: () => unknown): Promise<unknown> {
    try {
      return await call();
    } catch (error) {
      throw new HookFailure(link.descriptor.name, hook, error);
    }
  }
}
