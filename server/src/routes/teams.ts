import { Router } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate.js';
import { hasRole, requireRole } from '../middleware/requireRole.js';
import type { Services } from '../services/index.js';
import { assertTeamAccess, idParam, requireAuth } from './helpers.js';

const createTeamSchema = z.object({
  name: z.string().max(200),
  location: z.string().max(80).optional().default(''),
});

const joinTeamSchema = z.object({
  teamName: z.string().min(1).max(200),
  joinCode: z.string().min(1).max(20),
});

const playtesterSchema = z.object({
  playtester: z.boolean(),
});

const messageSchema = z.object({
  text: z.string().max(400),
});

export function createTeamsRouter(services: Services) {
  const router = Router();

  router.use(authenticate);

  router.get('/mine', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const hunt = await services.hunts.currentHunt();
      const team = await services.membership.teamForPerson(hunt.id, auth.personId);
      res.json({ team });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const { name, location } = createTeamSchema.parse(req.body ?? {});
      const hunt = await services.hunts.currentHunt();
      const team = await services.membership.createTeam(hunt.id, auth.personId, name, location);
      res.status(201).json({ team });
    } catch (error) {
      next(error);
    }
  });

  router.post('/join', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const { teamName, joinCode } = joinTeamSchema.parse(req.body ?? {});
      const hunt = await services.hunts.currentHunt();
      const team = await services.membership.joinTeam(auth.personId, hunt.id, teamName, joinCode);
      res.json({ team });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:teamId/leave', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const teamId = idParam.parse(req.params.teamId);
      await services.membership.leaveTeam(auth.personId, teamId);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:teamId/playtester', requireRole('staff'), async (req, res, next) => {
    try {
      const teamId = idParam.parse(req.params.teamId);
      const { playtester } = playtesterSchema.parse(req.body ?? {});
      const team = await services.membership.setPlaytester(teamId, playtester);
      res.json({ team });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:teamId/messages', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const teamId = idParam.parse(req.params.teamId);
      await assertTeamAccess(services, auth, teamId);
      const messages = await services.messages.listMessages(teamId);
      res.json({ messages });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:teamId/messages', async (req, res, next) => {
    try {
      const auth = requireAuth(req);
      const teamId = idParam.parse(req.params.teamId);
      const { text } = messageSchema.parse(req.body ?? {});
      await assertTeamAccess(services, auth, teamId);
      const message = await services.messages.sendMessage(teamId, text, hasRole(auth, ['staff']));
      res.status(201).json({ message });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
