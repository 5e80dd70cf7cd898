/**
 * Pipeline Responses
 *
 * A response is exactly one of three variants, discriminated by `kind`:
 * - `materialized`: finite content held in memory (HttpResponse)
 * - `streaming`: a lazy chunk sequence (StreamingHttpResponse)
 * - `deferred`: a template name plus context awaiting its render step
 *   (TemplateResponse)
 *
 * A TemplateResponse turns into one of the other two exactly once, by
 * `render()`.
 */

import { getTemplateEngine, type TemplateContext, type TemplateRenderer } from '../view/template.ts';
import { encodeChunk, mapChunks, toAsyncIterable } from './streaming.ts';
import type {
  Awaitable,
  Chunk,
  ChunkSource,
  CookieOptions,
  PipelineResponse,
  RenderedResponse,
} from './types.ts';

const decoder = new TextDecoder();

export const DEFAULT_CONTENT_TYPE = 'text/html; charset=utf-8';

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Status, headers and cookies shared by every response variant
 */
abstract class BaseResponse {
  status: number;
  readonly headers: Headers;
  private readonly cookies: string[] = [];

  constructor(options: ResponseOptions = {}) {
    this.status = options.status ?? 200;
    this.headers = new Headers(options.headers);
    if (!this.headers.has('Content-Type')) {
      this.headers.set('Content-Type', DEFAULT_CONTENT_TYPE);
    }
  }

  /**
   * Set a response header
   */
  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  /**
   * Set a cookie
   */
  setCookie(name: string, value: string, options: CookieOptions = {}): this {
    this.cookies.push(serializeCookie(name, value, options));
    return this;
  }

  /**
   * Expire a cookie on the client
   */
  deleteCookie(name: string, options: CookieOptions = {}): this {
    return this.setCookie(name, '', {
      ...options,
      maxAge: 0,
      expires: new Date(0),
    });
  }

  /**
   * Serialized Set-Cookie values, in the order they were set
   */
  get setCookieHeaders(): readonly string[] {
    return this.cookies;
  }

  /**
   * Copy status, headers and cookies onto another response
   */
  protected copyMetaTo<T extends BaseResponse>(target: T): T {
    target.status = this.status;
    this.headers.forEach((value, name) => {
      target.headers.set(name, value);
    });
    target.cookies.push(...this.cookies);
    return target;
  }
}

/**
 * Response with its full content in memory
 */
export class HttpResponse extends BaseResponse {
  readonly kind = 'materialized' as const;
  private _content: Uint8Array;

  constructor(content: Chunk | null = null, options?: ResponseOptions) {
    super(options);
    this._content = encodeChunk(content ?? '');
  }

  get content(): Uint8Array {
    return this._content;
  }

  /**
   * Replace the content
   */
  setContent(content: Chunk): this {
    this._content = encodeChunk(content);
    return this;
  }

  /**
   * Content decoded as UTF-8
   */
  text(): string {
    return decoder.decode(this._content);
  }

  /**
   * Content parsed as JSON
   */
  json(): unknown {
    return JSON.parse(this.text());
  }
}

/**
 * Response whose content is produced chunk by chunk, on demand.
 *
 * Hooks that alter the content must replace the sequence with another lazy
 * sequence (see `transformContent`), never read it to the end.
 */
export class StreamingHttpResponse extends BaseResponse {
  readonly kind = 'streaming' as const;
  private _content: AsyncIterable<Chunk>;

  constructor(content: ChunkSource<Chunk>, options?: ResponseOptions) {
    super(options);
    this._content = toAsyncIterable(content);
  }

  get streamingContent(): AsyncIterable<Chunk> {
    return this._content;
  }

  set streamingContent(content: ChunkSource<Chunk>) {
    this._content = toAsyncIterable(content);
  }

  /**
   * Replace the content with a lazily transformed view of itself
   */
  transformContent(transform: (chunk: Chunk, index: number) => Awaitable<Chunk>): this {
    this._content = mapChunks(this._content, transform);
    return this;
  }
}

export interface TemplateResponseOptions extends ResponseOptions {
  /** Render into a StreamingHttpResponse instead of a materialized one */
  streaming?: boolean;
  /** Engine to render with; defaults to the process-wide engine */
  engine?: TemplateRenderer;
}

export type PostRenderCallback = (
  response: RenderedResponse
) => Awaitable<RenderedResponse | undefined>;

/**
 * Deferred-render response: a template and its context.
 *
 * Middleware may change `templateName` and `context` until the pipeline
 * renders it.
 */
export class TemplateResponse extends BaseResponse {
  readonly kind = 'deferred' as const;
  templateName: string;
  context: TemplateContext;
  readonly streaming: boolean;

  private readonly engine?: TemplateRenderer;
  private readonly postRenderCallbacks: PostRenderCallback[] = [];
  private rendering: Promise<RenderedResponse> | null = null;
  private rendered: RenderedResponse | null = null;

  constructor(templateName: string, context: TemplateContext = {}, options: TemplateResponseOptions = {}) {
    super(options);
    this.templateName = templateName;
    this.context = context;
    this.streaming = options.streaming ?? false;
    this.engine = options.engine;
  }

  get isRendered(): boolean {
    return this.rendered !== null;
  }

  /**
   * The rendered response, once `render()` has completed
   */
  get renderedResponse(): RenderedResponse | null {
    return this.rendered;
  }

  /**
   * Run a callback on the rendered response; it may return a replacement
   */
  addPostRenderCallback(callback: PostRenderCallback): this {
    if (this.rendered) {
      throw new Error(`Template response "${this.templateName}" is already rendered`);
    }
    this.postRenderCallbacks.push(callback);
    return this;
  }

  /**
   * Render once. Later calls return the same rendered response.
   */
  render(): Promise<RenderedResponse> {
    if (!this.rendering) {
      this.rendering = this.renderOnce();
    }
    return this.rendering;
  }

  private async renderOnce(): Promise<RenderedResponse> {
    const engine = this.engine ?? getTemplateEngine();

    let response: RenderedResponse = this.streaming
      ? this.copyMetaTo(new StreamingHttpResponse(await engine.renderChunks(this.templateName, this.context)))
      : this.copyMetaTo(new HttpResponse(await engine.render(this.templateName, this.context)));

    for (const callback of this.postRenderCallbacks) {
      response = (await callback(response)) ?? response;
    }

    this.rendered = response;
    return response;
  }
}

export function isPipelineResponse(value: unknown): value is PipelineResponse {
  return (
    value instanceof HttpResponse ||
    value instanceof StreamingHttpResponse ||
    value instanceof TemplateResponse
  );
}

export function isRenderedResponse(value: unknown): value is RenderedResponse {
  return value instanceof HttpResponse || value instanceof StreamingHttpResponse;
}

/**
 * Fluent builder for responses
 */
export class ResponseBuilder {
  private _status = 200;
  private _headers = new Headers();
  private _cookies: Array<[string, string, CookieOptions]> = [];

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Set a cookie
   */
  cookie(name: string, value: string, options: CookieOptions = {}): this {
    this._cookies.push([name, value, options]);
    return this;
  }

  json(data: unknown): HttpResponse {
    this.defaultType('application/json; charset=utf-8');
    return this.finish(new HttpResponse(JSON.stringify(data), this.options()));
  }

  html(content: string): HttpResponse {
    this.defaultType(DEFAULT_CONTENT_TYPE);
    return this.finish(new HttpResponse(content, this.options()));
  }

  text(content: string): HttpResponse {
    this.defaultType('text/plain; charset=utf-8');
    return this.finish(new HttpResponse(content, this.options()));
  }

  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): HttpResponse {
    this._status = status;
    this._headers.set('Location', url);
    return this.finish(new HttpResponse(null, this.options()));
  }

  stream(content: ChunkSource<Chunk>): StreamingHttpResponse {
    return this.finish(new StreamingHttpResponse(content, this.options()));
  }

  template(
    name: string,
    context: TemplateContext = {},
    options: Omit<TemplateResponseOptions, keyof ResponseOptions> = {}
  ): TemplateResponse {
    return this.finish(new TemplateResponse(name, context, { ...options, ...this.options() }));
  }

  /**
   * 204 No Content
   */
  noContent(): HttpResponse {
    this._status = 204;
    return this.finish(new HttpResponse(null, this.options()));
  }

  notFound(message = 'Not Found'): HttpResponse {
    this._status = 404;
    return this.json({ error: message });
  }

  badRequest(message = 'Bad Request'): HttpResponse {
    this._status = 400;
    return this.json({ error: message });
  }

  forbidden(message = 'Forbidden'): HttpResponse {
    this._status = 403;
    return this.json({ error: message });
  }

  serverError(message = 'Internal Server Error'): HttpResponse {
    this._status = 500;
    return this.json({ error: message });
  }

  private defaultType(contentType: string): void {
    if (!this._headers.has('Content-Type')) {
      this._headers.set('Content-Type', contentType);
    }
  }

  private options(): ResponseOptions {
    return { status: this._status, headers: this._headers };
  }

  private finish<T extends BaseResponse>(response: T): T {
    for (const [name, value, options] of this._cookies) {
      response.setCookie(name, value, options);
    }
    return response;
  }
}

/**
 * Start building a response
 */
export function respond(): ResponseBuilder {
  return new ResponseBuilder();
}

function serializeCookie(name: string, value: string, options: CookieOptions): string {
  const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

  if (options.maxAge !== undefined) {
    parts.push(`Max-Age=${options.maxAge}`);
  }
  if (options.expires) {
    parts.push(`Expires=${options.expires.toUTCString()}`);
  }
  if (options.path) {
    parts.push(`Path=${options.path}`);
  }
  if (options.domain) {
    parts.push(`Domain=${options.domain}`);
  }
  if (options.secure) {
    parts.push('Secure');
  }
  if (options.httpOnly) {
    parts.push('HttpOnly');
  }
  if (options.sameSite) {
    parts.push(`SameSite=${options.sameSite}`);
  }

  return parts.join('; ');
}
