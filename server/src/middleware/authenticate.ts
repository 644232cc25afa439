import type { Request, Response, NextFunction } from 'express';
import { verifyAccessToken } from '../tokens.js';
import { HttpError } from '../utils/errors.js';

const BEARER_PREFIX = 'Bearer ';

export function readBearerToken(header: string | undefined): string | null {
  if (!header?.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

/** Resolves the caller's person id and role from an access token. */
export function authenticate(req: Request, _res: Response, next: NextFunction) {
  const token = readBearerToken(req.headers.authorization);
  if (!token) {
    return next(new HttpError(401, 'Missing authorization token'));
  }

  try {
    const { sub, role } = verifyAccessToken(token);
    req.auth = { personId: sub, role };
    return next();
  } catch (error) {
    return next(new HttpError(401, 'Invalid or expired token', error));
  }
}
