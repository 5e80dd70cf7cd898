/**
 * Pipeline Request
 *
 * Wraps the native Request with the accessors middleware commonly need,
 * plus typed extension slots. Middleware attaches per-request data
 * (an authenticated principal, a session) to the request through slots,
 * never to its own instance.
 */

const decoder = new TextDecoder();

/**
 * A typed key for a request extension slot.
 *
 * Values live in a WeakMap keyed by the request, so they are dropped with
 * the request and never shared between requests.
 */
export class RequestSlot<T> {
  private readonly values = new WeakMap<HttpRequest, T>();

  constructor(readonly name: string) {}

  /** @internal */
  read(request: HttpRequest): T | undefined {
    return this.values.get(request);
  }

  /** @internal */
  write(request: HttpRequest, value: T): void {
    this.values.set(request, value);
  }

  /** @internal */
  isSetOn(request: HttpRequest): boolean {
    return this.values.has(request);
  }
}

/**
 * Create a typed extension slot
 *
 * @example
 * ```ts
 * const principal = createSlot<{ id: string }>('principal');
 * request.attach(principal, { id: 'u-1' });
 * request.slot(principal)?.id;
 * ```
 */
export function createSlot<T>(name: string): RequestSlot<T> {
  return new RequestSlot<T>(name);
}

/**
 * Request value flowing through the pipeline
 */
export class HttpRequest {
  private readonly _request: Request;
  private readonly _url: URL;
  private readonly _startTime: number;
  private readonly _attached = new Set<string>();
  private _bytes: Promise<Uint8Array> | null = null;

  constructor(request: Request, startTime: number = performance.now()) {
    this._request = request;
    this._url = new URL(request.url);
    this._startTime = startTime;
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  /**
   * HTTP method (GET, POST, etc.)
   */
  get method(): string {
    return this._request.method;
  }

  /**
   * Full URL
   */
  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  /**
   * Get a specific header value
   */
  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request start time for timing
   */
  get startTime(): number {
    return this._startTime;
  }

  get isSecure(): boolean {
    return this._url.protocol === 'https:';
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Get the client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ??
      this.header('X-Real-IP') ??
      'unknown'
    );
  }

  /**
   * Cookies sent with the request
   */
  get cookies(): Map<string, string> {
    const cookies = new Map<string, string>();

    for (const pair of (this.header('Cookie') ?? '').split(';')) {
      const separator = pair.indexOf('=');
      if (separator <= 0) continue;
      const name = pair.slice(0, separator).trim();
      cookies.set(name, decodeCookieValue(pair.slice(separator + 1).trim()));
    }

    return cookies;
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Request body as bytes. The native body is read once and cached, so any
   * number of middleware may inspect it.
   */
  bytes(): Promise<Uint8Array> {
    if (!this._bytes) {
      this._bytes = this._request.arrayBuffer().then((buffer) => new Uint8Array(buffer));
    }
    return this._bytes;
  }

  async text(): Promise<string> {
    return decoder.decode(await this.bytes());
  }

  async json(): Promise<unknown> {
    return JSON.parse(await this.text());
  }

  /**
   * Parse an application/x-www-form-urlencoded body
   */
  async form(): Promise<URLSearchParams> {
    return new URLSearchParams(await this.text());
  }

  /**
   * Attach a value to an extension slot. Slots are additive: there is no
   * way to detach one, a later attach replaces the value.
   */
  attach<T>(slot: RequestSlot<T>, value: T): this {
    slot.write(this, value);
    this._attached.add(slot.name);
    return this;
  }

  /**
   * Read an extension slot
   */
  slot<T>(slot: RequestSlot<T>): T | undefined {
    return slot.read(this);
  }

  hasSlot<T>(slot: RequestSlot<T>): boolean {
    return slot.isSetOn(this);
  }

  /**
   * Names of the slots attached so far
   */
  get attachedSlots(): readonly string[] {
    return [...this._attached];
  }
}

/**
 * Percent-decode a cookie value; malformed escapes keep the raw value
 */
function decodeCookieValue(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }
    throw error;
  }
}
