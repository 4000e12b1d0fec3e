import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';
import { IDEMPOTENCY_HEADER } from './controllers';
import { AppError } from './utils';

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security headers and parameter-pollution guard
  app.use(helmet());
  app.use(hpp());

  // CORS: `*` in CORS_ORIGIN opens every origin, requests without an Origin pass
  app.use(
    cors({
      origin: (origin, callback) => {
        const allowed =
          !origin || env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin);
        callback(null, allowed);
      },
      credentials: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Accept', IDEMPOTENCY_HEADER],
    })
  );

  // Rate limiting, rendered through the error handler like every other failure
  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      limit: env.RATE_LIMIT_MAX_REQUESTS,
      standardHeaders: true,
      legacyHeaders: false,
      skip: () => env.NODE_ENV === 'test',
      handler: (_req, _res, next) => {
        next(AppError.tooManyRequests('Too many requests, please try again later'));
      },
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Ledger Reconciliation API',
      version: '1.0.0',
      tenants: `${env.API_PREFIX}/tenants`,
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
