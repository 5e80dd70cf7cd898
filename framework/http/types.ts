/**
 * HTTP Type Definitions
 */

import type { HttpRequest } from './request.ts';
import type { HttpResponse, StreamingHttpResponse, TemplateResponse } from './response.ts';

export type Awaitable<T> = T | Promise<T>;

/**
 * A unit of response content
 */
export type Chunk = string | Uint8Array;

/**
 * Lazy chunk sequence, consumed on demand
 */
export type ChunkSource<T = Chunk> = Iterable<T> | AsyncIterable<T>;

/**
 * A response whose content exists (eagerly or as a stream)
 */
export type RenderedResponse = HttpResponse | StreamingHttpResponse;

/**
 * Any response a hook or view may produce
 */
export type PipelineResponse = RenderedResponse | TemplateResponse;

export type ResponseKind = PipelineResponse['kind'];

export type ViewArgs = readonly unknown[];
export type ViewKwargs = Readonly<Record<string, unknown>>;

/**
 * View handler. The request is passed separately from its arguments.
 */
export type ViewHandler = (
  request: HttpRequest,
  args: ViewArgs,
  kwargs: ViewKwargs
) => Awaitable<PipelineResponse>;

/**
 * A resolved view: the handler plus its positional and keyword arguments
 */
export interface ViewDescriptor {
  handler: ViewHandler;
  args?: ViewArgs;
  kwargs?: ViewKwargs;
}

/**
 * Maps a request to the view that serves it (routing lives outside the pipeline)
 */
export type ViewResolver = (request: HttpRequest) => Awaitable<ViewDescriptor>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
