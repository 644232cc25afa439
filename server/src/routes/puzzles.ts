import { Router } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate.js';
import type { Services } from '../services/index.js';
import { loadCallerTeam, puzzleIdParam, requireAuth } from './helpers.js';

const submissionSchema = z.object({
  text: z.string(),
});

export function createPuzzlesRouter(services: Services) {
  const router = Router();

  router.use(authenticate);

  router.get('/', async (req, res, next) => {
    try {
      const { team } = await loadCallerTeam(services, requireAuth(req));
      const puzzles = await services.unlockEngine.unlockedPuzzles(team.id);
      res.json({ puzzles });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:puzzleId/submissions', async (req, res, next) => {
    try {
      const puzzleId = puzzleIdParam.parse(req.params.puzzleId);
      const { text } = submissionSchema.parse(req.body ?? {});
      const { team } = await loadCallerTeam(services, requireAuth(req));

      const result = await services.grader.gradeSubmission(team.id, puzzleId, text);
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:puzzleId/submissions', async (req, res, next) => {
    try {
      const puzzleId = puzzleIdParam.parse(req.params.puzzleId);
      const { team } = await loadCallerTeam(services, requireAuth(req));
      const submissions = await services.grader.submissionHistory(team.id, puzzleId);
      res.json({ submissions });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
