import { Router } from 'express';
import { z } from 'zod';
import type { Services } from '../lib/services';
import { buildPlacementProfiles } from '../lib/placements/build-placement-profiles';
import { importPlacements } from '../lib/placements/import-placements';
import { buildPlacementProfilesSchema } from '../lib/validations/extraction';

const importBodySchema = z.array(z.unknown()).min(1);

export function createPlacementsRouter(services: Services) {
  const router = Router();

  // POST /api/placements - Import historical placement records
  router.post('/', async (req, res, next) => {
    try {
      const rows = importBodySchema.parse(req.body);
      const result = await importPlacements(services.store, rows);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  // POST /api/placements/profiles - Synthesize anchor profiles for placements without one
  router.post('/profiles', async (req, res, next) => {
    try {
      const { limit } = buildPlacementProfilesSchema.parse(req.body ?? {});
      const created = await buildPlacementProfiles(services, limit);
      res.json({ created });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
