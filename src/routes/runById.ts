import { Router } from 'express';
import { z } from 'zod';
import type { Services } from '../lib/services';
import { getRunDetails, getRunLogs } from '../lib/processing/run-details';
import { AppError } from '../middleware/errorHandler';

const runParamsSchema = z.object({
  runId: z.coerce.number().int().positive(),
});

export function createRunByIdRouter(services: Services) {
  const router = Router({ mergeParams: true });

  // GET /api/runs/:runId - Run, JD summary and ranked candidates
  router.get('/', async (req, res, next) => {
    try {
      const { runId } = runParamsSchema.parse(req.params);
      const details = await getRunDetails(services.store, runId);
      if (!details) throw new AppError('Run not found', 404);

      res.json(details);
    } catch (error) {
      next(error);
    }
  });

  // GET /api/runs/:runId/logs - Agent trace in recorded order
  router.get('/logs', async (req, res, next) => {
    try {
      const { runId } = runParamsSchema.parse(req.params);
      const logs = await getRunLogs(services.store, runId);
      if (!logs) throw new AppError('Run not found', 404);

      res.json({ runId, logs });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
