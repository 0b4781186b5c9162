/**
 * HTTP Security Middleware
 *
 * - Helmet for HTTP security headers
 * - CORS configuration
 * - Rate limiting to prevent abuse
 * - Request ID and request logging
 */

import { Request, Response, NextFunction, Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger';

const logger = createLogger('SECURITY');

// Configuration interface
export interface SecurityConfig {
  // CORS
  corsOrigins?: string[] | string;

  // Rate limiting
  rateLimitWindowMs?: number;  // Time window in ms
  rateLimitMax?: number;       // Max requests per window
}

const defaultConfig = {
  corsOrigins: '*',
  rateLimitWindowMs: 15 * 60 * 1000, // 15 minutes
  rateLimitMax: 300,
} satisfies Required<SecurityConfig>;

const RATE_LIMIT_MESSAGE = 'Too many requests, please try again later';

/**
 * Configure CORS middleware
 */
export function configureCors(config: SecurityConfig = {}): ReturnType<typeof cors> {
  return cors({
    origin: config.corsOrigins ?? defaultConfig.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: [
      'X-Request-ID',
      'RateLimit-Limit',
      'RateLimit-Remaining',
      'RateLimit-Reset',
    ],
    maxAge: 86400, // 24 hours
  });
}

/**
 * Configure Helmet middleware for HTTP security headers.
 * Remote rooftop images are previewed on the demo page, hence https: in imgSrc.
 */
export function configureHelmet(): ReturnType<typeof helmet> {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'blob:', 'https:'],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        connectSrc: ["'self'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  });
}

/**
 * Configure rate limiting middleware
 */
export function configureRateLimit(config: SecurityConfig = {}): ReturnType<typeof rateLimit> {
  return rateLimit({
    windowMs: config.rateLimitWindowMs || defaultConfig.rateLimitWindowMs,
    limit: config.rateLimitMax || defaultConfig.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    // Skip rate limiting for health checks
    skip: (req: Request) => req.path === '/health',
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        method: req.method,
      });
      res.status(429).json({ error: RATE_LIMIT_MESSAGE, code: 'TOO_MANY_REQUESTS' });
    },
  });
}

/**
 * Request ID middleware - adds unique ID to each request for tracing
 */
export function addRequestId(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();

  res.locals.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Read the request ID set by addRequestId
 */
export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : 'unknown';
}

/**
 * Request logging middleware
 */
export function logRequests(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  logger.debug('Incoming request', {
    request_id: getRequestId(res),
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 400 ? 'warn' : 'debug';

    logger[logLevel]('Request completed', {
      request_id: getRequestId(res),
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
    });
  });

  next();
}

/**
 * Apply all security middleware to an Express app
 */
export function applySecurityMiddleware(app: Express, config: SecurityConfig = {}): void {
  // One reverse proxy in front, so req.ip is the client for rate limiting
  app.set('trust proxy', 1);

  // Add request ID first
  app.use(addRequestId);
  app.use(logRequests);
  app.use(configureHelmet());
  app.use(configureCors(config));
  app.use(configureRateLimit(config));

  logger.debug('Security middleware applied', {
    rateLimit: {
      windowMs: config.rateLimitWindowMs || defaultConfig.rateLimitWindowMs,
      max: config.rateLimitMax || defaultConfig.rateLimitMax,
    },
  });
}
