/**
 * HTTP Layer
 *
 * Request and response values that flow through the pipeline, and the
 * node:http adapter that carries them.
 */

export {
  Server,
  toWebRequest,
  writeResponse,
  type ServerOptions,
  type RequestHandler,
  type IncomingRequest,
  type ResponseWriter,
} from './server.ts';
export { HttpRequest, RequestSlot, createSlot } from './request.ts';
export {
  HttpResponse,
  StreamingHttpResponse,
  TemplateResponse,
  ResponseBuilder,
  respond,
  isPipelineResponse,
  isRenderedResponse,
  DEFAULT_CONTENT_TYPE,
  type ResponseOptions,
  type TemplateResponseOptions,
  type PostRenderCallback,
} from './response.ts';
export {
  mapChunks,
  transformChunks,
  toAsyncIterable,
  encodeChunk,
  concatBytes,
  collectChunks,
  type ChunkTransformer,
} from './streaming.ts';
export type {
  Awaitable,
  Chunk,
  ChunkSource,
  RenderedResponse,
  PipelineResponse,
  ResponseKind,
  ViewArgs,
  ViewKwargs,
  ViewHandler,
  ViewDescriptor,
  ViewResolver,
  HttpMethod,
  CookieOptions,
} from './types.ts';
