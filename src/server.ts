import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { buildContext } from './context';
import { loadAppConfig } from './config/app.config';
import { loadSectionCatalog } from './config/sections';
import { checkSupabaseConnection, createSupabaseAdmin } from './config/supabase';
import { SupabaseAttendanceRepository } from './repositories/supabaseAttendance.repository';
import logger from './config/logger';

const startServer = async () => {
  try {
    const config = loadAppConfig();
    const catalog = loadSectionCatalog(config.sectionsFile);
    logger.info(`Loaded ${catalog.sections.length} sections from ${config.sectionsFile}`);

    if (!config.supabase) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
    }
    await checkSupabaseConnection(config.supabase);

    const repository = new SupabaseAttendanceRepository(createSupabaseAdmin(config.supabase));
    const app = createApp(buildContext(config, catalog, repository, repository));

    const server = app.listen(config.port, () => {
      logger.info(`Server running in ${config.nodeEnv} mode on port ${config.port}`);
      logger.info(`Health check: http://localhost:${config.port}/health`);
      logger.info(`API documentation: http://localhost:${config.port}/docs`);
    });

    // Graceful shutdown
    const gracefulShutdown = () => {
      logger.info('Shutting down gracefully...');
      server.close(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', gracefulShutdown);
    process.on('SIGINT', gracefulShutdown);

    process.on('unhandledRejection', (err: unknown) => {
      logger.error('Unhandled Promise Rejection:', err);
      gracefulShutdown();
    });

    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      gracefulShutdown();
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
