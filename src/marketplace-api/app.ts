import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { Marketplace } from '@core/marketplace';
import { errorHandler, requestLogger } from './middleware/index';
import { createApiRouter } from './routes/index';

export interface AppOptions {
  marketplace: Marketplace;
  clientUrl: string;
  faucetEnabled: boolean;
  logRequests?: boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(
    API_PREFIX,
    createApiRouter({ marketplace: options.marketplace, faucetEnabled: options.faucetEnabled }),
  );

  app.use(errorHandler);
  return app;
}
