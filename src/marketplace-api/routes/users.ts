import { Router } from 'express';
import type { Marketplace } from '@core/marketplace';
import { asyncHandler, callerIdentity } from '../middleware/index';

export function usersRouter(marketplace: Marketplace): Router {
  const router = Router();

  // Register the caller as a client or freelancer
  router.post(
    '/users',
    asyncHandler(async (req, res) => {
      const user = await marketplace.registerUser(callerIdentity(req), req.body);
      res.status(201).json({ success: true, data: { ...user, createdAt: user.createdAt.toISOString() } });
    }),
  );

  router.get(
    '/users/:identity',
    asyncHandler(async (req, res) => {
      const user = await marketplace.getUser(req.params.identity);
      res.json({ success: true, data: { ...user, createdAt: user.createdAt.toISOString() } });
    }),
  );

  return router;
}
