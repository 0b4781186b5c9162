/**
 * Express application factory.
 * Dependencies are injectable so tests can swap the image loader and strategy.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import path from 'path';
import {
  AppConfig,
  config as defaultConfig,
  createAnalysisStrategy,
  applySecurityMiddleware,
  createLogger,
  getRequestId,
  ErrorCodes,
  errorMessage,
} from '@rooftop/shared';
import { createImageLoader } from './image-loader';
import { createRoutes, RouteDependencies } from './routes';

const logger = createLogger('APP');

/**
 * body-parser errors carry an HTTP status and a `type` string
 */
function bodyParserFailure(err: unknown): { status: number; type: string } | null {
  if (typeof err !== 'object' || err === null) return null;
  const status: unknown = Reflect.get(err, 'status');
  const type: unknown = Reflect.get(err, 'type');
  if (typeof status === 'number' && typeof type === 'string') {
    return { status, type };
  }
  return null;
}

export function createApp(overrides: Partial<RouteDependencies> = {}): Express {
  const config: AppConfig = overrides.config ?? defaultConfig;
  const deps: RouteDependencies = {
    config,
    imageLoader: overrides.imageLoader ?? createImageLoader(config.image),
    strategy: overrides.strategy ?? createAnalysisStrategy(config),
  };

  const app = express();

  applySecurityMiddleware(app, {
    corsOrigins: config.http.corsOrigins,
    rateLimitWindowMs: config.http.rateLimitWindowMs,
    rateLimitMax: config.http.rateLimitMax,
  });

  // Uploads arrive base64 encoded, roughly 4/3 of the raw size
  app.use(express.json({ limit: Math.ceil((config.image.maxBytes * 4) / 3) + 64 * 1024 }));

  // Demo page
  app.use(express.static(path.join(__dirname, '../public')));

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'rooftop-api',
      strategy: deps.strategy.name,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/', createRoutes(deps));

  // Body-parser failures and anything a route did not catch
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const failure = bodyParserFailure(err);
    if (failure?.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Request body is not valid JSON', code: ErrorCodes.INVALID_INPUT });
      return;
    }
    if (failure?.type === 'entity.too.large') {
      res.status(413).json({ error: 'Image is too large to analyze.', code: ErrorCodes.IMAGE_TOO_LARGE });
      return;
    }
    if (failure && failure.status >= 400 && failure.status < 500) {
      res.status(failure.status).json({ error: 'Request body could not be read', code: ErrorCodes.INVALID_INPUT });
      return;
    }
    logger.error(`Unhandled middleware error: ${errorMessage(err)}`, { request_id: getRequestId(res), path: req.path });
    res.status(500).json({ error: 'Internal server error', code: ErrorCodes.INTERNAL_ERROR });
  });

  return app;
}
