/**
 * Strata Application Entry Point
 *
 * Boot sequence: load configuration, describe the available middleware,
 * build the pipeline, then start the server.
 */

import { randomUUID } from 'node:crypto';
import { Application } from './framework/app.ts';
import { getConfig, loadConfig } from './framework/config/config.ts';
import { Server } from './framework/http/server.ts';
import { respond } from './framework/http/response.ts';
import { createSlot } from './framework/http/request.ts';
import type { ViewDescriptor } from './framework/http/types.ts';
import { MiddlewareCatalog } from './framework/middleware/catalog.ts';
import { constructed, notUsed } from './framework/middleware/types.ts';
import { TemplateEngine } from './framework/view/template.ts';

class PageNotFound extends Error {
  constructor(readonly path: string) {
    super(`No page at ${path}`);
    this.name = 'PageNotFound';
  }
}

const requestId = createSlot<string>('requestId');

const catalog = new MiddlewareCatalog()
  .register('request-id', () =>
    constructed({
      processRequest(request) {
        request.attach(requestId, request.header('X-Request-Id') ?? randomUUID());
      },
      processResponse(request, response) {
        return response.setHeader('X-Request-Id', request.slot(requestId) ?? 'unknown');
      },
    })
  )
  .register('maintenance', () => {
    if (!getConfig().getBoolean('maintenance', false)) {
      return notUsed('maintenance mode is off');
    }
    return constructed({
      processRequest() {
        return respond().status(503).text('Down for maintenance');
      },
    });
  })
  .register('not-found', () =>
    constructed({
      processException(_request, error) {
        if (error instanceof PageNotFound) {
          return respond().notFound(error.message);
        }
      },
    })
  )
  .register('timing', () =>
    constructed({
      processResponse(request, response) {
        const elapsed = performance.now() - request.startTime;
        return response.setHeader('Server-Timing', `app;dur=${elapsed.toFixed(1)}`);
      },
    })
  );

const templates = new TemplateEngine().register(
  'home',
  '<h1>{{ title }}</h1><ul>{% for item in items %}<li>{{ item }}</li>{% endfor %}</ul>'
);

const views: Record<string, ViewDescriptor> = {
  '/': {
    handler: () => respond().template('home', { title: 'Strata', items: ['request', 'view', 'response'] }),
  },
  '/count': {
    handler: (_request, args) => respond().stream(countTo(Number(args[0]))),
    args: [5],
  },
};

async function* countTo(limit: number): AsyncGenerator<string> {
  for (let n = 1; n <= limit; n++) {
    yield `${n}\n`;
  }
}

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Create application instance
  const app = new Application({
    config,
    catalog,
    templates,
    resolveView: (request) =>
      views[request.path] ?? {
        handler: () => {
          throw new PageNotFound(request.path);
        },
      },
  });

  // 3. Build the pipeline; a middleware that fails to construct stops startup
  await app.ready();

  // 4. Start server
  const server = new Server(app, {
    port: config.getNumber('port', 8000),
    hostname: config.getString('host', '0.0.0.0'),
  });
  await server.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start strata:', error);
  process.exit(1);
});
