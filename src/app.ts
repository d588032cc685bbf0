import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { config as defaultConfig, type AppConfig } from './config/env.js';
import { createActivitiesRouter } from './routes/activities.js';
import type { ActivityRegistry } from './services/registry.js';
import { isHttpError, MethodNotAllowedError } from './utils/errors.js';
import { httpLogStream, logger } from './utils/logger.js';

export interface AppDeps {
  registry: ActivityRegistry;
  config?: AppConfig;
}

export function createApp({ registry, config = defaultConfig }: AppDeps) {
  const app = express();

  // Middleware
  app.use(cors(config.corsOrigins.length > 0 ? { origin: config.corsOrigins } : undefined));
  app.use(morgan('short', { stream: httpLogStream }));

  app.get('/', (_req: Request, res: Response) => {
    res.redirect(307, '/static/index.html');
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      activities: registry.size,
      timestamp: new Date().toISOString()
    });
  });

  // Routes
  app.use('/static', express.static(config.staticDir));
  app.use('/activities', createActivitiesRouter(registry));

  // Handle 404
  app.use((req: Request, res: Response) => {
    logger.warn('404 Not Found', { method: req.method, path: req.path });
    res.status(404).json({ detail: 'Not Found' });
  });

  // Error handling
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (isHttpError(err)) {
      logger.warn('Request rejected', {
        method: req.method,
        url: req.originalUrl,
        status: err.status,
        detail: err.detail
      });
      if (err instanceof MethodNotAllowedError) {
        res.set('Allow', err.allow);
      }
      res.status(err.status).json({ detail: err.detail });
      return;
    }

    logger.error('Unhandled error:', {
      error: err.message,
      stack: err.stack,
      url: req.originalUrl,
      method: req.method
    });
    res.status(500).json({
      detail: config.nodeEnv === 'production' ? 'Internal Server Error' : err.message
    });
  });

  return app;
}

export default createApp;
