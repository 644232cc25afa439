import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { IntegrityError, isHttpError } from '../utils/errors.js';

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (error instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', details: error.issues });
    return;
  }

  if (error instanceof IntegrityError) {
    console.error('Data integrity violation, operator action required', error.message, error.details);
  }

  if (isHttpError(error)) {
    res.status(error.status).json({
      error: error.message,
      details: error.details ?? undefined,
    });
    return;
  }

  console.error('Unhandled error', error);
  res.status(500).json({ error: 'Internal server error' });
}
