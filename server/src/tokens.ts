import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from './env.js';
import type { UserRole } from './types.js';

const tokenPayloadSchema = z.object({
  sub: z.string().min(1), // person id
  role: z.enum(['player', 'staff']),
  type: z.literal('access'),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

/** Sessions are issued by the registration front end; this mirrors its format. */
export function createAccessToken(payload: { sub: string; role: UserRole }) {
  return jwt.sign({ ...payload, type: 'access' }, env.JWT_SECRET, {
    expiresIn: env.ACCESS_TOKEN_TTL_SECONDS,
  });
}

export function verifyAccessToken(token: string): TokenPayload {
  return tokenPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET));
}
