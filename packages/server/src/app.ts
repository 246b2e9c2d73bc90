import express, { type Express } from 'express';
import cors from 'cors';
import { pinoHttp } from 'pino-http';
import { MAX_BODY_SIZE } from '@lmstudio-compat-proxy/shared';
import type { AppContext } from './lib/context.js';
import { createErrorHandler } from './middlewares/error.middleware.js';
import { createProxyRoutes } from './modules/proxy/index.js';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Nothing of the proxy's own in forwarded responses
  app.disable('x-powered-by');

  if (ctx.config.corsEnabled) {
    // Wildcard: any origin, method and header
    app.use(cors({ origin: '*', methods: '*', allowedHeaders: '*' }));
  }

  // Request logging
  app.use(
    pinoHttp({
      logger: ctx.logger,
    })
  );

  // Whole body as bytes, whatever the content type
  app.use(express.raw({ type: () => true, limit: MAX_BODY_SIZE }));

  // Every method and path goes upstream
  app.use('/', createProxyRoutes(ctx));

  // Error handling
  app.use(createErrorHandler(ctx.logger));

  return app;
}
