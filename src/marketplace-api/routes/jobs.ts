import { Router } from 'express';
import type { Marketplace } from '@core/marketplace';
import { toApplicationView, toJobView } from '@core/views';
import { asyncHandler, callerIdentity } from '../middleware/index';

export function jobsRouter(marketplace: Marketplace): Router {
  const router = Router();

  // Post a job and move its amount into escrow
  router.post(
    '/jobs',
    asyncHandler(async (req, res) => {
      const details = await marketplace.postJob(callerIdentity(req), req.body);
      res.status(201).json({ success: true, data: toJobView(details) });
    }),
  );

  // List jobs (?client=&status=)
  router.get(
    '/jobs',
    asyncHandler(async (req, res) => {
      const jobs = await marketplace.listJobs(req.query);
      res.json({ success: true, data: jobs.map(toJobView) });
    }),
  );

  router.get(
    '/jobs/:jobId',
    asyncHandler(async (req, res) => {
      const details = await marketplace.getJob(req.params.jobId);
      res.json({ success: true, data: toJobView(details) });
    }),
  );

  // Apply to a job as the calling freelancer
  router.post(
    '/jobs/:jobId/applications',
    asyncHandler(async (req, res) => {
      const application = await marketplace.applyToJob(
        callerIdentity(req),
        req.params.jobId,
        req.body,
      );
      res.status(201).json({ success: true, data: toApplicationView(application) });
    }),
  );

  router.get(
    '/jobs/:jobId/applications',
    asyncHandler(async (req, res) => {
      const rows = await marketplace.listApplications(req.params.jobId);
      res.json({ success: true, data: rows.map(toApplicationView) });
    }),
  );

  router.post(
    '/jobs/:jobId/applications/:applicationId/approve',
    asyncHandler(async (req, res) => {
      const { job, application } = await marketplace.approveApplication(
        callerIdentity(req),
        req.params.jobId,
        req.params.applicationId,
      );
      res.json({
        success: true,
        data: {
          job: { id: job.id, status: job.status, filled: job.filled },
          application: toApplicationView(application),
        },
      });
    }),
  );

  // Accept submitted work: records the review and pays the freelancer out of escrow
  router.post(
    '/jobs/:jobId/applications/:applicationId/approve-submission',
    asyncHandler(async (req, res) => {
      const { job, application, escrow } = await marketplace.approveSubmission(
        callerIdentity(req),
        req.params.jobId,
        req.params.applicationId,
        req.body,
      );
      res.json({
        success: true,
        data: {
          job: { id: job.id, status: job.status, filled: job.filled },
          application: toApplicationView(application),
          payout: {
            amount: job.amount.toString(),
            releasedTo: escrow.releasedTo,
            escrowBalance: escrow.balance.toString(),
          },
        },
      });
    }),
  );

  return router;
}
