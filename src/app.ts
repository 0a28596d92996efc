import path from 'path';
import express, { Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { config } from './config';
import { logger } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRoutes, RouteDependencies } from './routes';
import { specs } from './swagger';

const PUBLIC_DIR = path.join(__dirname, '..', 'public');

/**
 * Build the Express application around already-initialized services.
 */
export function createApp(deps: RouteDependencies): express.Application {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || config.cors.origins.includes('*') || config.cors.origins.includes(origin)) {
          return callback(null, true);
        }
        logger.warn(`CORS: Rejected origin: ${origin}`);
        return callback(null, false);
      },
      methods: ['GET', 'POST', 'DELETE'],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Request logging
  app.use((req, _res, next) => {
    logger.http(`${req.method} ${req.path}`);
    next();
  });

  // Web UI
  app.use(express.static(PUBLIC_DIR));

  // API Documentation
  app.use(
    '/api-docs',
    swaggerUi.serve,
    swaggerUi.setup(specs, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'wakebox API Documentation',
    })
  );

  // Routes
  app.use('/api', createRoutes(deps));

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check endpoint
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is healthy
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/HealthCheck'
   *       503:
   *         description: Service is degraded (device store unreadable)
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/HealthCheck'
   */
  app.get('/health', async (_req: Request, res: Response) => {
    const health = {
      uptime: process.uptime(),
      timestamp: Date.now(),
      status: 'ok',
      environment: config.server.env,
      version: config.version,
      checks: {
        deviceStore: 'unknown',
        statusProbe: deps.orchestrator.isProbeInProgress() ? 'running' : 'idle',
      },
    };

    try {
      await deps.registry.list();
      health.checks.deviceStore = 'healthy';
    } catch (error) {
      logger.warn('Health check could not read the device store', {
        error: error instanceof Error ? error.message : String(error),
      });
      health.checks.deviceStore = 'unhealthy';
      health.status = 'degraded';
    }

    res.status(health.status === 'ok' ? 200 : 503).json(health);
  });

  // 404 handler
  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
