import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/logger';
import { API_VERSION } from './middleware/response';
import { createSessionsRouter } from './routes/sessions';
import { ServiceContainer, getServices } from '../services/index';

/**
 * Create and configure Express application
 */
export function createApp(services: ServiceContainer = getServices()): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000', 'http://localhost:5173'],
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '64kb' }));

  // Compression
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // Health check (before routes for fast response)
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      capabilities: services.capabilities(),
      activeSessions: services.sessions.size,
      timestamp: new Date().toISOString(),
    });
  });

  // API routes
  app.use('/api/v1/sessions', createSessionsRouter(services.sessions));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
