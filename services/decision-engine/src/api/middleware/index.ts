/**
 * API Middleware
 *
 * Express middleware stack for the engine API:
 * - Security headers (Helmet)
 * - CORS with an origin allow-list (ALLOWED_ORIGINS, required in production)
 * - Rate limiting with standard RateLimit-* headers
 * - JSON body parsing (1mb limit)
 * - Request logging
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import { rateLimit } from 'express-rate-limit';
import type { MinimalLogger } from '../types';

const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:3000', 'http://localhost:3400'];

function resolveAllowedOrigins(): string[] {
  const raw = process.env.ALLOWED_ORIGINS;
  if (!raw) {
    if (process.env.NODE_ENV === 'production') {
      throw new Error('CORS MISCONFIGURATION: ALLOWED_ORIGINS environment variable is required in production');
    }
    return DEFAULT_ALLOWED_ORIGINS;
  }
  return raw
    .split(',')
    .map(origin => origin.trim().toLowerCase())
    .filter(origin => origin.length > 0);
}

/**
 * @throws Error in production when ALLOWED_ORIGINS is unset
 */
export function configureMiddleware(app: Express, logger: MinimalLogger): void {
  const allowedOrigins = new Set(resolveAllowedOrigins().map(origin => origin.toLowerCase()));

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
        },
      },
      frameguard: { action: 'deny' },
      hsts: { maxAge: 31536000, includeSubDomains: true, preload: true },
    })
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    // Origins compare case-insensitively; the caller's spelling is echoed back
    if (origin && allowedOrigins.has(origin.toLowerCase())) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      limit: 300,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('API Request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - start,
        ip: req.ip ?? 'unknown',
      });
    });
    next();
  });
}
