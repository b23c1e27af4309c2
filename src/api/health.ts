import express, { Express, Request, Response, Router } from 'express';
import { Server } from 'http';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { checkDatabase } from '../config/database.js';
import { isRedisConnected } from '../config/redis.js';
import { arkhamClient, coinGeckoClient } from '../services/external/index.js';
import { dataRouter } from './data.js';

let server: Server | null = null;

/**
 * Express app with health checks and the data API mounted under /api
 */
export function createApp(router: Router = dataRouter): Express {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  // Mount data API router
  app.use('/api', router);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Ready check (for k8s)
  app.get('/ready', async (_req: Request, res: Response) => {
    const reasons: string[] = [];

    if (!(await checkDatabase())) {
      reasons.push('PostgreSQL unreachable');
    }

    if (!isRedisConnected()) {
      reasons.push('Redis not connected');
    }

    const providers = {
      arkham: arkhamClient.isConfigured(),
      coingecko: coinGeckoClient.isConfigured(),
    };

    if (reasons.length > 0) {
      res.status(503).json({ ready: false, reasons, providers });
      return;
    }

    res.json({
      ready: true,
      mode: providers.arkham && providers.coingecko ? 'full' : 'limited',
      providers,
    });
  });

  return app;
}

/**
 * Start the HTTP API
 */
export async function startApi(): Promise<void> {
  if (server) {
    logger.warn('API already running');
    return;
  }

  const app = createApp();

  return new Promise((resolve) => {
    server = app.listen(config.port, () => {
      logger.info(`API listening on port ${config.port}`);
      resolve();
    });
  });
}

/**
 * Stop the HTTP API
 */
export async function stopApi(): Promise<void> {
  const running = server;

  if (!running) {
    return;
  }

  return new Promise((resolve, reject) => {
    running.close((err) => {
      if (err) {
        reject(err);
      } else {
        server = null;
        logger.info('API stopped');
        resolve();
      }
    });
  });
}
