import express, { type Express, type Request, type Response, type NextFunction, type ErrorRequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import logger from './logger';
import type { Server } from 'node:http';
import { CardCatalog, loadDataset, type DatasetReader } from './card-dataset';
import { createCardRouter } from './card-routes';
import type { ServerSettings } from './config/settings';

export const API_INFO = {
  message: 'PTCGP API - TCG Pocket Simulator',
  version: '1.0.0'
} as const;

export const createApp = (catalog: CardCatalog): Express => {
  const app: Express = express();

  // Middleware
  app.use(helmet());
  app.use(cors());

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  app.get('/', (_req: Request, res: Response): void => {
    res.json(API_INFO);
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response): void => {
    const loaded = catalog.isLoaded();
    res.status(loaded ? 200 : 503).json({
      status: loaded ? 'healthy' : 'loading',
      cards: loaded ? catalog.current().cards.length : 0,
      timestamp: new Date().toISOString()
    });
  });

  app.use(createCardRouter(catalog));

  // 404 handler
  app.use((_req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware
  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    logger.error('Unhandled error', { error: err });
    res.status(500).json({ error: 'Internal server error' });
  };

  app.use(errorHandler);

  return app;
};

const listen = (app: Express, port: number, host: string): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      server.on('error', (error) => {
        logger.error('Server error', { error });
      });
      resolve(server);
    });
  });

/**
 * Loads the dataset and starts listening. Nothing is bound until the dataset
 * has been published, so a missing or malformed source rejects before `listen`.
 */
export const startService = async (
  settings: Pick<ServerSettings, 'dataPath' | 'host' | 'port'>,
  reader?: DatasetReader
): Promise<Server> => {
  const catalog = new CardCatalog();
  catalog.publish(await loadDataset(settings.dataPath, reader));

  const server = await listen(createApp(catalog), settings.port, settings.host);
  logger.info(`Server running on http://${settings.host}:${settings.port}`);
  return server;
};
