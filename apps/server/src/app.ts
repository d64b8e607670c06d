import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from 'express';
import {
  resolveClock,
  resolveExpression,
  type DisplayIntent,
  type ResolverContext,
} from '@time-banner/core';
import { ServiceError, toErrorResponse } from './errors.js';
import type { Logger } from './logger.js';
import { parsePath } from './path.js';
import { renderInstant, resolveOutputFormat, type RenderedImage } from './render/index.js';

export interface AppOptions {
  context: ResolverContext;
  logger: Logger;
}

function send(res: Response, image: RenderedImage): void {
  res.status(200).type(image.contentType).send(image.body);
}

/**
 * One log line per request: method, path, status and duration.
 */
function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      const line = `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - started}ms`;
      if (res.statusCode >= 500) {
        logger.error(line);
      } else if (res.statusCode >= 400) {
        logger.warn(line);
      } else {
        logger.info(line);
      }
    });
    next();
  };
}

function errorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, _req, res, _next) => {
    let serviceError: ServiceError;
    if (error instanceof ServiceError) {
      serviceError = error;
    } else if (error instanceof URIError) {
      serviceError = new ServiceError('parse', error.message);
    } else {
      logger.error('Unhandled error while serving request', error);
      const message = error instanceof Error ? error.message : String(error);
      serviceError = new ServiceError('render', message);
    }

    const { status, body } = toErrorResponse(serviceError);
    res.status(status).json(body);
  };
}

/**
 * Builds the Express application.
 *
 * Routes:
 * - `GET /` redirects to `/relative/<current epoch seconds>`
 * - `GET /favicon.ico` renders a clock showing the current time
 * - `GET /relative/:path` and `GET /absolute/:path` force the display style
 * - `GET /:path` uses the style the resolver picked
 *
 * `:path` is an expression with an optional extension (default svg).
 */
export function createApp({ context, logger }: AppOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger(logger));

  const renderPath = (style: DisplayIntent | 'resolved') => (req: Request, res: Response) => {
    const [expression, extension] = parsePath(req.params.path);
    const format = resolveOutputFormat(extension);

    const result = resolveExpression(expression, context);
    if (!result.success) {
      logger.debug(`Rejected "${expression}" (${result.error.kind}): ${result.error.message}`);
      throw ServiceError.fromParseError(result.error);
    }

    const resolved = result.data;
    send(res, renderInstant(resolved, style === 'resolved' ? resolved.displayIntent : style, format, context.now()));
  };

  app.get('/', (_req, res) => {
    const epoch = Math.floor(context.now().getTime() / 1000);
    res.redirect(307, `/relative/${epoch}`);
  });

  app.get('/favicon.ico', (_req, res) => {
    const resolved = resolveClock(context);
    send(res, renderInstant(resolved, 'clock', 'svg', resolved.instant));
  });

  app.get('/relative/:path', renderPath('relative'));
  app.get('/absolute/:path', renderPath('absolute'));
  app.get('/:path', renderPath('resolved'));

  app.use(() => {
    throw new ServiceError('not-found', 'No route matches this path');
  });

  app.use(errorHandler(logger));

  return app;
}
