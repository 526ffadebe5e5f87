import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';

import type { Services } from './lib/services';
import { errorHandler, notFound } from './middleware/errorHandler';
import { createRunsRouter } from './routes/runs';
import { createRunByIdRouter } from './routes/runById';
import { createPlacementsRouter } from './routes/placements';

export function createApp(services: Services): Application {
  const app: Application = express();
  const { allowedOrigins, nodeEnv } = services.config.server;

  // ============================
  // MIDDLEWARE
  // ============================

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (curl, server-to-server)
        if (!origin) return callback(null, true);

        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
      credentials: true,
    })
  );

  app.use(compression());

  if (nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }

  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  // ============================
  // ROUTES
  // ============================

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.get('/', (req, res) => {
    res.json({
      message: 'Profile Sourcing API',
      version: '1.0.0',
      endpoints: {
        runs: '/api/runs',
        run: '/api/runs/:runId',
        logs: '/api/runs/:runId/logs',
        placements: '/api/placements',
        placementProfiles: '/api/placements/profiles',
        health: '/health',
      },
    });
  });

  app.use('/api/runs/:runId', createRunByIdRouter(services));
  app.use('/api/runs', createRunsRouter(services));
  app.use('/api/placements', createPlacementsRouter(services));

  // ============================
  // ERROR HANDLING
  // ============================

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
