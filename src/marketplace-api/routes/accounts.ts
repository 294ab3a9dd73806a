import { Router } from 'express';
import type { Marketplace } from '@core/marketplace';
import { toAccountView } from '@core/views';
import { asyncHandler } from '../middleware/index';

export function accountsRouter(marketplace: Marketplace, faucetEnabled: boolean): Router {
  const router = Router();

  router.get(
    '/accounts/:identity',
    asyncHandler(async (req, res) => {
      const account = await marketplace.getAccount(req.params.identity);
      res.json({ success: true, data: toAccountView(account) });
    }),
  );

  // Development faucet: credits an account out of thin air.
  if (faucetEnabled) {
    router.post(
      '/accounts/:identity/deposit',
      asyncHandler(async (req, res) => {
        const account = await marketplace.fundAccount(req.params.identity, req.body);
        res.json({ success: true, data: toAccountView(account) });
      }),
    );
  }

  return router;
}
