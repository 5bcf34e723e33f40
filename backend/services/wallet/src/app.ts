import compression from 'compression';
import cors from 'cors';
import express, { Application } from 'express';
import mongoSanitize from 'express-mongo-sanitize';
import helmet from 'helmet';
import { Container } from './container';
import { WebhookController } from './controllers/webhook.controller';
import { errorHandler } from './middleware/error-handler';
import { rateLimiter } from './middleware/rate-limiter';
import { createApiRouter } from './routes';
import { webhookRoutes } from './routes/webhook.routes';
import { logger } from './utils/logger';

export const createApp = (container: Container): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request logging
  app.use((req, res, next) => {
    logger.info(`${req.method} ${req.path}`, {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent')
    });
    next();
  });

  // Webhooks need the raw body, so they come before the JSON parser
  app.use(webhookRoutes(new WebhookController(container.webhooks)));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(mongoSanitize());

  // Compression middleware
  app.use(compression());

  // Rate limiting
  app.use('/api', rateLimiter());

  // API routes
  app.use('/api/v1', createApiRouter(container));

  // Health check
  app.get('/health', (req, res) => {
    res.json({
      success: true,
      message: 'Wallet service is healthy',
      timestamp: new Date(),
      services: container.readiness.report()
    });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Route not found'
      }
    });
  });

  // Error handling middleware
  app.use(errorHandler);

  return app;
};
