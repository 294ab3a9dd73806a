import { Router } from 'express';
import type { Marketplace } from '@core/marketplace';
import healthRouter from './health';
import { usersRouter } from './users';
import { accountsRouter } from './accounts';
import { jobsRouter } from './jobs';
import { applicationsRouter } from './applications';

export interface ApiRouterOptions {
  marketplace: Marketplace;
  faucetEnabled: boolean;
}

export function createApiRouter({ marketplace, faucetEnabled }: ApiRouterOptions): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(usersRouter(marketplace));
  router.use(accountsRouter(marketplace, faucetEnabled));
  router.use(jobsRouter(marketplace));
  router.use(applicationsRouter(marketplace));
  return router;
}
