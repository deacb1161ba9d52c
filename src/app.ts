import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';
import { AppError } from './utils/AppError';

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;

        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: [
        'Content-Type',
        'Authorization',
        'X-Requested-With',
        'Accept',
        'X-User-Id',
        'X-User-Name',
        'X-User-Handle',
      ],
    })
  );

  // Rate limiting (skipped under test)
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(AppError.tooManyRequests('Too many requests, please try again later'));
    },
  });

  if (env.NODE_ENV !== 'test') {
    app.use(limiter);
  }

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));

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
      message: 'Tabkeeper Backend API',
      version: '1.0.0',
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
