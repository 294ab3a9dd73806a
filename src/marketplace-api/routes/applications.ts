import { Router } from 'express';
import type { Marketplace } from '@core/marketplace';
import { toApplicationView } from '@core/views';
import { asyncHandler, callerIdentity } from '../middleware/index';

export function applicationsRouter(marketplace: Marketplace): Router {
  const router = Router();

  router.get(
    '/applications/:applicationId',
    asyncHandler(async (req, res) => {
      const application = await marketplace.getApplication(req.params.applicationId);
      res.json({ success: true, data: toApplicationView(application) });
    }),
  );

  // Submit (or resubmit) work for an approved application
  router.post(
    '/applications/:applicationId/submission',
    asyncHandler(async (req, res) => {
      const application = await marketplace.submitWork(
        callerIdentity(req),
        req.params.applicationId,
        req.body,
      );
      res.json({ success: true, data: toApplicationView(application) });
    }),
  );

  return router;
}
