import type { Request, Response, NextFunction } from 'express';
import { HttpError } from '../utils/errors.js';
import type { AuthContext, UserRole } from '../types.js';

export function hasRole(auth: AuthContext | undefined, roles: readonly UserRole[]) {
  return auth !== undefined && roles.includes(auth.role);
}

/** Runs after `authenticate`; staff-only routes pass `'staff'`. */
export function requireRole(...roles: UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.auth) {
      return next(new HttpError(401, 'Missing authorization token'));
    }
    if (!hasRole(req.auth, roles)) {
      return next(new HttpError(403, `Requires role ${roles.join(' or ')}`, { requiredRoles: roles }));
    }
    return next();
  };
}
