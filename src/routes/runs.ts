import { Router } from 'express';
import { z } from 'zod';
import type { Services } from '../lib/services';
import { executeRun, prepareRun } from '../lib/processing/pipeline';
import { createRunSchema } from '../lib/validations/extraction';

const listRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createRunsRouter(services: Services) {
  const router = Router();

  // POST /api/runs - Parse the JD, create the run and source in the background
  router.post('/', async (req, res, next) => {
    try {
      const body = createRunSchema.parse(req.body);
      const { run, jd } = await prepareRun(services, body);

      executeRun(services, run, jd, { useBrowser: body.useBrowser }).catch((error: unknown) => {
        // executeRun has already marked the run FAILED
        console.error(`Run ${run.id} stopped:`, error);
      });

      res.status(202).json({
        runId: run.id,
        jdId: jd.id,
        status: run.status,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/runs - Recent runs with counters
  router.get('/', async (req, res, next) => {
    try {
      const { limit, offset } = listRunsQuerySchema.parse(req.query);
      const runs = await services.store.listRuns(limit, offset);
      res.json({ runs, limit, offset });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
