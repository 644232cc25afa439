import { Router } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate.js';
import { requireRole } from '../middleware/requireRole.js';
import type { Services } from '../services/index.js';
import { idParam, loadCallerTeam, requireAuth } from './helpers.js';

const responseUpdateSchema = z.object({
  responseText: z.string().max(400),
});

export function createProgressRouter(services: Services) {
  const router = Router();

  router.get('/standings', async (_req, res, next) => {
    try {
      const hunt = await services.hunts.currentHunt();
      const standings = await services.standings.standings(hunt.id);
      res.json({ hunt: { id: hunt.id, name: hunt.name }, standings });
    } catch (error) {
      next(error);
    }
  });

  router.get('/unlockables', authenticate, async (req, res, next) => {
    try {
      const { team } = await loadCallerTeam(services, requireAuth(req));
      const unlockables = await services.unlockables.teamUnlockables(team.id);
      res.json({ unlockables });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/submissions/:submissionId', authenticate, requireRole('staff'), async (req, res, next) => {
    try {
      const submissionId = idParam.parse(req.params.submissionId);
      const { responseText } = responseUpdateSchema.parse(req.body ?? {});
      const submission = await services.grader.updateResponse(submissionId, responseText);
      res.json({ submission });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
