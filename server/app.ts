import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import type { OfficeConfig } from './core/config';
import { createErrorResponse, logAndRespond, logRequest, requestIdMiddleware } from './core/logger';
import type { OfficeServices } from './core/officeServices';
import { getSession } from './core/session';
import { globalRateLimiter } from './middleware/rateLimiting';
import { registerRoutes } from './loaders/routes';
import { getStartupHealth } from './loaders/startup';

export interface AppLifecycle {
  isShuttingDown: () => boolean;
}

function getAllowedOrigins(cfg: OfficeConfig): string[] | boolean {
  if (!cfg.isProduction) {
    return true;
  }
  return cfg.allowedOrigins.length > 0 ? cfg.allowedOrigins : false;
}

export function createApp(services: OfficeServices, cfg: OfficeConfig, lifecycle: AppLifecycle): Express {
  const app = express();

  app.get('/healthz', (req, res) => {
    res.status(200).send('OK');
  });

  app.get('/api/ready', async (req, res) => {
    const startupHealth = getStartupHealth();

    if (lifecycle.isShuttingDown()) {
      res.status(503).json({ ready: false, reason: 'shutting_down' });
      return;
    }

    try {
      await services.store.ping();
      res.status(200).json({
        ready: true,
        startupHealth,
        uptime: process.uptime()
      });
    } catch {
      res.status(503).json({
        ready: false,
        reason: 'store_unavailable',
        startupHealth
      });
    }
  });

  app.set('trust proxy', 1);
  app.disable('x-powered-by');
  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (cfg.isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(cors({
    origin: getAllowedOrigins(cfg),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(getSession(cfg));
  app.use(globalRateLimiter);

  registerRoutes(app, services, cfg);

  app.use('/api', (req, res) => {
    res.status(404).json(createErrorResponse(req, 'Not found', 'NOT_FOUND'));
  });

  // Body parser failures and anything else that escaped a route
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json(createErrorResponse(req, 'Malformed JSON body', 'VALIDATION_ERROR'));
      return;
    }
    logAndRespond(req, res, 500, 'Internal server error', err, 'INTERNAL_ERROR');
  });

  return app;
}
