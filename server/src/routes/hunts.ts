import { Router } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate.js';
import { requireRole } from '../middleware/requireRole.js';
import type { HuntUpdate } from '../services/huntManager.js';
import type { Services } from '../services/index.js';
import { idParam } from './helpers.js';

const timestamp = z.string().datetime({ offset: true });

const createHuntSchema = z.object({
  name: z.string().min(1).max(200),
  number: z.number().int(),
  teamSize: z.number().int().min(1),
  startsAt: timestamp,
  endsAt: timestamp,
  location: z.string().max(100).optional().default(''),
  isCurrent: z.boolean().optional(),
});

const updateHuntSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  number: z.number().int().optional(),
  teamSize: z.number().int().min(1).optional(),
  startsAt: timestamp.optional(),
  endsAt: timestamp.optional(),
  location: z.string().max(100).optional(),
  isCurrent: z.boolean().optional(),
});

export function createHuntsRouter(services: Services) {
  const router = Router();

  router.get('/current', async (_req, res, next) => {
    try {
      const hunt = await services.hunts.currentHunt();
      res.json({ hunt, status: services.hunts.status(hunt) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/previous', async (_req, res, next) => {
    try {
      const hunts = await services.hunts.previousHunts();
      res.json({ hunts });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', authenticate, requireRole('staff'), async (req, res, next) => {
    try {
      const payload = createHuntSchema.parse(req.body ?? {});
      const hunt = await services.hunts.createHunt({
        name: payload.name,
        number: payload.number,
        team_size: payload.teamSize,
        starts_at: payload.startsAt,
        ends_at: payload.endsAt,
        location: payload.location,
        is_current: payload.isCurrent,
      });
      res.status(201).json({ hunt });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:huntId', authenticate, requireRole('staff'), async (req, res, next) => {
    try {
      const huntId = idParam.parse(req.params.huntId);
      const payload = updateHuntSchema.parse(req.body ?? {});

      const update: HuntUpdate = {};
      if (payload.name !== undefined) update.name = payload.name;
      if (payload.number !== undefined) update.number = payload.number;
      if (payload.teamSize !== undefined) update.team_size = payload.teamSize;
      if (payload.startsAt !== undefined) update.starts_at = payload.startsAt;
      if (payload.endsAt !== undefined) update.ends_at = payload.endsAt;
      if (payload.location !== undefined) update.location = payload.location;
      if (payload.isCurrent !== undefined) update.is_current = payload.isCurrent;

      const hunt = await services.hunts.updateHunt(huntId, update);
      res.json({ hunt });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:huntId/current', authenticate, requireRole('staff'), async (req, res, next) => {
    try {
      const huntId = idParam.parse(req.params.huntId);
      const hunt = await services.hunts.setCurrent(huntId);
      res.json({ hunt });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
