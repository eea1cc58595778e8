import crypto from 'crypto';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { debugLogger } from '../utils/debug-logger';

export const API_KEY_HEADER = 'X-API-KEY';

/**
 * Security headers middleware using helmet.
 * The service only serves JSON, so the policy denies everything else.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  referrerPolicy: { policy: 'no-referrer' },
});

// Read-only API: any origin may GET
export const corsMiddleware = cors({
  origin: true,
  methods: ['GET'],
  allowedHeaders: ['Content-Type', API_KEY_HEADER],
});

export interface ApiKeyAuthOptions {
  /** Expected key; when null every request passes */
  apiKey: string | null;
  /** Paths served without a key */
  publicPaths?: string[];
}

/**
 * API key authentication middleware.
 * If a key is configured, requests must send it in the X-API-KEY header.
 */
export function createApiKeyAuth(options: ApiKeyAuthOptions): RequestHandler {
  const { apiKey, publicPaths = [] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey || publicPaths.includes(req.path)) {
      next();
      return;
    }

    const providedKey = req.header(API_KEY_HEADER);

    if (!providedKey) {
      debugLogger.warn('AUTH', 'Unauthorized: API Key missing.', { path: req.path });
      res.status(401).json({ error: 'API Key missing' });
      return;
    }

    if (!keysMatch(providedKey, apiKey)) {
      debugLogger.warn('AUTH', 'Unauthorized: Invalid API Key provided.', { path: req.path });
      res.status(401).json({ error: 'Invalid API Key' });
      return;
    }

    next();
  };
}

/**
 * Constant-time comparison; hashing first gives both sides the same length
 */
function keysMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export interface InboundRateLimitOptions {
  permitLimit: number;
  windowMs: number;
}

/**
 * Fixed-window limit on client requests, answered with 429 once exhausted
 */
export function createRateLimiter(options: InboundRateLimitOptions): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.permitLimit,
    message: { error: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

export function createErrorHandler(exposeMessages: boolean): ErrorRequestHandler {
  return (
    err: Error & { status?: number },
    _req: Request,
    res: Response,
    _next: NextFunction
  ): void => {
    console.error('Error:', err);

    res.status(err.status || 500).json({
      error: 'Internal server error',
      message: exposeMessages ? err.message : undefined,
    });
  };
}

export function requestLogger(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const start = Date.now();
  // Captured up front: mounted routers rewrite req.path
  const path = req.path;

  res.on('finish', () => {
    const duration = Date.now() - start;
    console.log(`${req.method} ${path} - ${res.statusCode} - ${duration}ms`);
  });

  next();
}
