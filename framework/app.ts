/**
 * Application Class
 *
 * Ties configuration, the middleware pipeline and view resolution together.
 * The pipeline is built on first use (or by `ready()`), exactly once, and
 * shared by every request afterwards.
 */

import { Config, setConfig, type ConfigOptions } from './config/config.ts';
import { HttpRequest } from './http/request.ts';
import { HttpResponse } from './http/response.ts';
import type { RenderedResponse, ViewResolver } from './http/types.ts';
import { MiddlewareCatalog } from './middleware/catalog.ts';
import { buildChain, type Chain } from './middleware/chain.ts';
import { Dispatcher } from './middleware/dispatcher.ts';
import { MiddlewareRegistry } from './middleware/registry.ts';
import type { MiddlewareDefinition } from './middleware/types.ts';
import { isLogLevel, Logger } from './telemetry/logger.ts';
import { setTemplateEngine, TemplateEngine } from './view/template.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  /** Maps a request to its view */
  resolveView: ViewResolver;
  /** Ordered middleware; when absent, `config.middleware` is resolved through `catalog` */
  middleware?: readonly MiddlewareDefinition[];
  catalog?: MiddlewareCatalog;
  logger?: Logger;
  templates?: TemplateEngine;
}

/**
 * Main Application class
 */
export class Application {
  readonly config: Config;
  private readonly logger: Logger;
  private readonly resolveView: ViewResolver;
  private readonly definitions?: readonly MiddlewareDefinition[];
  private readonly catalog: MiddlewareCatalog;
  private readonly templates: TemplateEngine;
  private pipeline: Promise<Dispatcher> | null = null;
  private dispatcher: Dispatcher | null = null;

  constructor(options: ApplicationOptions) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? createLogger(this.config);
    this.resolveView = options.resolveView;
    this.definitions = options.middleware;
    this.catalog = options.catalog ?? new MiddlewareCatalog();
    this.templates =
      options.templates ??
      new TemplateEngine({
        viewsPath: this.config.getString('templates.path', './templates'),
        extension: this.config.getString('templates.extension', '.html'),
      });
  }

  /**
   * Build the pipeline if it is not built yet. Rejects with the
   * ConstructionError when a middleware cannot be constructed.
   */
  ready(): Promise<Dispatcher> {
    if (!this.pipeline) {
      this.pipeline = Promise.resolve().then(() => this.build());
    }
    return this.pipeline;
  }

  /**
   * The built chain, or null before the first build
   */
  get chain(): Chain | null {
    return this.dispatcher?.chain ?? null;
  }

  /**
   * Handle a request. Always resolves: pipeline faults and build failures
   * become a 500 response.
   */
  async handle(input: Request | HttpRequest): Promise<RenderedResponse> {
    const request = input instanceof HttpRequest ? input : new HttpRequest(input);

    try {
      const dispatcher = await this.ready();
      const view = await this.resolveView(request);
      return await dispatcher.dispatch(request, view);
    } catch (error) {
      this.logger.error('Request failed', error, { method: request.method, path: request.path });
      return this.fallback(error);
    }
  }

  private build(): Dispatcher {
    // Factories read settings through getConfig()
    setConfig(this.config);
    setTemplateEngine(this.templates);

    const options = { verbose: this.config.debug, logger: this.logger };
    let registry: MiddlewareRegistry;
    let chain: Chain;
    try {
      registry = this.definitions
        ? new MiddlewareRegistry(this.definitions, options)
        : MiddlewareRegistry.fromCatalog(this.config.middleware, this.catalog, options);
      chain = buildChain(registry);
    } catch (error) {
      this.logger.error('Failed to build middleware chain', error);
      throw error;
    }

    this.logger.info('Middleware chain built', {
      middleware: chain.names(),
      omitted: registry.omitted.map((entry) => entry.name),
    });

    this.dispatcher = new Dispatcher(chain, { logger: this.logger });
    return this.dispatcher;
  }

  /**
   * Generic failure response
   */
  private fallback(error: unknown): HttpResponse {
    const body =
      this.config.debug && error instanceof Error
        ? `Internal Server Error\n\n${error.name}: ${error.message}`
        : 'Internal Server Error';

    return new HttpResponse(body, {
      status: 500,
      headers: { 'Content-Type': 'text/plain; charset=utf-8' },
    });
  }
}

/**
 * Create a new application
 */
export function createApp(options: ApplicationOptions): Application {
  return new Application(options);
}

function createLogger(config: Config): Logger {
  const level = config.get('logLevel');
  return new Logger({
    level: isLogLevel(level) ? level : 'info',
    format: config.get('logFormat') === 'json' ? 'json' : 'pretty',
  });
}
