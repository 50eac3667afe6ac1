import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import hpp from 'hpp';
import { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger } from './middleware/logger.middleware';
import { createGeneralLimiter } from './middleware/rateLimit.middleware';
import { createV1Router } from './routes/v1';
import { setupSwagger } from './config/swagger';
import logger from './config/logger';

export const createApp = (ctx: AppContext): Express => {
  const app = express();
  const { config } = ctx;

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
    })
  );
  app.use(hpp());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Compression middleware
  app.use(compression());

  // Request logging
  if (config.nodeEnv !== 'test') {
    app.use(requestLogger);
  }

  // Rate limiting
  app.use('/api', createGeneralLimiter(config.rateLimit));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({
      success: true,
      message: 'Server is healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
    });
  });

  app.use('/api/v1', createV1Router(ctx));

  // Swagger documentation
  if (config.nodeEnv !== 'test') {
    setupSwagger(app);
  }

  logger.info('Express app configured successfully');

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
