import express, { Express } from 'express';
import path from 'path';

import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import swaggerJsdoc from 'swagger-jsdoc';
import GaugeIndexer from '../datafetch/GaugeIndexer';
import { GaugeSystem } from '../ledger/GaugeSystem';
import SimpleCacheService from '../services/cache/CacheService';
import GaugeController from './controllers/GaugeController';
import UserController from './controllers/UserController';
import loggerMiddleware from './middlewares/LoggerMiddleware';
import { createGaugeRoutes } from './routes/GaugeRoutes';
import { createUserRoutes } from './routes/UserRoutes';

export interface ApiOptions {
  /** serve the swagger documentation under /api-docs */
  docs?: boolean;
}

/**
 * Read-only http api over the ledger. Cached responses are dropped on every
 * ledger commit.
 */
export function createApi(system: GaugeSystem, indexer?: GaugeIndexer, options: ApiOptions = {}): Express {
  const app: Express = express();

  app.use(cors());
  app.use(helmet());
  app.use(compression());
  app.disable('x-powered-by');
  app.use(loggerMiddleware);

  if (options.docs !== false) {
    const openapiSpecification = swaggerJsdoc({
      definition: {
        openapi: '3.0.0',
        info: {
          title: 'Gauge node api documentation',
          version: '1.0.0'
        },
        tags: [
          {
            name: 'gauges',
            description: 'Gauge weights and allocations'
          },
          {
            name: 'users',
            description: 'User balances, allocations and delegations'
          }
        ]
      },
      // files containing the @openapi annotations, sources or build output
      apis: [path.join(__dirname, 'routes', '*.ts'), path.join(__dirname, 'routes', '*.js')]
    });
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiSpecification));
  }

  app.use('/api/', createGaugeRoutes(new GaugeController(system, indexer)));
  app.use('/api/', createUserRoutes(new UserController(system)));

  system.store.subscribe(() => SimpleCacheService.ClearAll());

  return app;
}
