/**
 * Express application bootstrap.
 * Sets up HTTP server with routes and middleware.
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { AppConfig, loadConfig, validateConfig } from '../config/env';
import { ValidationDependencies } from '../services/validationContext';
import { InputFormatError } from '../types/errors';
import { logger as rootLogger } from '../utils/logger';
import { createRouter } from './routes';

export interface AppOptions {
  config: AppConfig;
  dependencies?: Partial<ValidationDependencies>;
}

/**
 * Create and configure Express application
 */
export function createApp(options: AppOptions): Application {
  const { config } = options;
  const logger = rootLogger.child('http');
  const app = express();

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      query: req.query,
      ip: req.ip,
    });
    next();
  });

  // API routes
  app.use('/', createRouter({ config, dependencies: options.dependencies, logger }));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not Found',
      message: 'The requested endpoint does not exist',
    });
  });

  // Error handler; bad uploads and malformed JSON are the client's fault
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError || err instanceof InputFormatError || err instanceof SyntaxError) {
      res.status(400).json({
        success: false,
        error: 'Invalid request',
        message: err.message,
      });
      return;
    }

    logger.error('Unhandled error in request', err);
    res.status(500).json({
      success: false,
      error: 'Internal Server Error',
      message: config.nodeEnv === 'development' ? err.message : 'An error occurred',
    });
  });

  return app;
}

/**
 * Start the HTTP server
 */
export function startServer(): void {
  try {
    // Validate configuration before starting
    const config = loadConfig();
    validateConfig(config);
    rootLogger.info('Configuration validated successfully');

    const app = createApp({ config });

    app.listen(config.port, () => {
      rootLogger.info(`🚀 Email pipeline validator started`, {
        port: config.port,
        env: config.nodeEnv,
        heloDomain: config.pipeline.smtp.heloDomain,
        bulkConcurrency: config.bulkConcurrency,
      });
      rootLogger.info(`Health check available at: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    rootLogger.error('Failed to start server', error);
    process.exit(1);
  }
}

// Start server if this file is executed directly
if (require.main === module) {
  startServer();
}
