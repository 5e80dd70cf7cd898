/**
 * HTTP Server
 *
 * Wraps node:http with the pipeline's request/response values.
 */

import { createServer, type IncomingHttpHeaders, type Server as NodeServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { concatBytes, encodeChunk } from './streaming.ts';
import type { RenderedResponse } from './types.ts';

export interface ServerOptions {
  port?: number;
  hostname?: string;
  logger?: Logger;
  onListen?: (address: AddressInfo) => void;
}

/**
 * Anything that turns a Request into a rendered response (an Application)
 */
export interface RequestHandler {
  handle(request: Request): Promise<RenderedResponse>;
}

/**
 * The parts of an IncomingMessage the server reads
 */
export interface IncomingRequest extends AsyncIterable<unknown> {
  readonly url?: string;
  readonly method?: string;
  readonly headers: IncomingHttpHeaders;
}

/**
 * The parts of a ServerResponse the server writes to
 */
export interface ResponseWriter {
  statusCode: number;
  readonly destroyed: boolean;
  setHeader(name: string, value: string | string[]): unknown;
  write(chunk: Uint8Array): boolean;
  end(): unknown;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

/**
 * HTTP server for strata applications
 */
export class Server {
  private readonly port: number;
  private readonly hostname: string;
  private readonly logger: Logger;
  private readonly onListen?: (address: AddressInfo) => void;
  private server: NodeServer | null = null;

  constructor(
    private readonly app: RequestHandler,
    options: ServerOptions = {}
  ) {
    this.port = options.port ?? 8000;
    this.hostname = options.hostname ?? '0.0.0.0';
    this.logger = (options.logger ?? getLogger()).child({ component: 'server' });
    this.onListen = options.onListen;
  }

  /**
   * Start listening; resolves with the bound address
   */
  listen(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('Server is already listening'));
    }

    const server = createServer((incoming, outgoing) => {
      this.respond(incoming, outgoing).catch((error: unknown) => {
        this.logger.error('Failed to write response', error, { method: incoming.method, url: incoming.url });
        outgoing.destroy();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.hostname, () => {
        server.off('error', reject);

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not bound to a TCP address'));
          return;
        }

        this.logger.info(`Listening on http://${address.address}:${address.port}`);
        this.onListen?.(address);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  private async respond(incoming: IncomingRequest, outgoing: ResponseWriter): Promise<void> {
    const request = await toWebRequest(incoming);
    const response = await this.app.handle(request);
    await writeResponse(outgoing, response);
  }
}

/**
 * Convert an incoming message to a WHATWG Request. The body is read in full
 * for methods that carry one.
 */
export async function toWebRequest(incoming: IncomingRequest, protocol: 'http' | 'https' = 'http'): Promise<Request> {
  const url = new URL(incoming.url ?? '/', `${protocol}://${incoming.headers.host ?? 'localhost'}`);
  const method = (incoming.method ?? 'GET').toUpperCase();

  const headers = new Headers();
  for (const [name, value] of Object.entries(incoming.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  if (method === 'GET' || method === 'HEAD') {
    return new Request(url, { method, headers });
  }

  const parts: Uint8Array[] = [];
  for await (const chunk of incoming) {
    if (typeof chunk === 'string') {
      parts.push(encodeChunk(chunk));
    } else if (chunk instanceof Uint8Array) {
      parts.push(chunk);
    } else {
      throw new TypeError('Request body produced a non-binary chunk');
    }
  }

  return new Request(url, { method, headers, body: concatBytes(parts) });
}

/**
 * Write a rendered response. Streaming content is pulled one chunk at a
 * time, waiting for `drain` under backpressure; production stops when the
 * connection closes.
 */
export async function writeResponse(target: ResponseWriter, response: RenderedResponse): Promise<void> {
  target.statusCode = response.status;
  response.headers.forEach((value, name) => {
    target.setHeader(name, value);
  });
  if (response.setCookieHeaders.length > 0) {
    target.setHeader('Set-Cookie', [...response.setCookieHeaders]);
  }

  if (response.kind === 'materialized') {
    const content = response.content;
    target.setHeader('Content-Length', String(content.byteLength));
    if (content.byteLength > 0) {
      target.write(content);
    }
    target.end();
    return;
  }

  for await (const chunk of response.streamingContent) {
    if (target.destroyed) break;
    if (!target.write(encodeChunk(chunk))) {
      await waitForDrain(target);
      if (target.destroyed) break;
    }
  }

  if (!target.destroyed) {
    target.end();
  }
}

function waitForDrain(target: ResponseWriter): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      target.off('drain', done);
      target.off('close', done);
      resolve();
    };
    target.once('drain', done);
    target.once('close', done);
  });
}
