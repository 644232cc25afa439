import type { Request } from 'express';
import { z } from 'zod';
import { hasRole } from '../middleware/requireRole.js';
import { HttpError, NotFoundError } from '../utils/errors.js';
import type { Services } from '../services/index.js';
import type { AuthContext } from '../types.js';

export const idParam = z.string().min(1).max(64);
export const puzzleIdParam = z.string().regex(/^[0-9a-fA-F]{1,8}$/, 'Puzzle ids are hexadecimal');

export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new HttpError(401, 'Missing authorization token');
  }
  return req.auth;
}

/** The caller's team in the current hunt. */
export async function loadCallerTeam(services: Services, auth: AuthContext) {
  const hunt = await services.hunts.currentHunt();
  const team = await services.membership.teamForPerson(hunt.id, auth.personId);
  if (!team) {
    throw new NotFoundError('No team registered for the current hunt');
  }
  return { hunt, team };
}

export async function assertTeamAccess(services: Services, auth: AuthContext, teamId: string) {
  if (hasRole(auth, ['staff'])) {
    return;
  }
  if (!(await services.membership.isMember(teamId, auth.personId))) {
    throw new HttpError(403, 'Not a member of this team');
  }
}
