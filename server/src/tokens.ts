import jwt from 'jsonwebtoken';
import crypto from 'node:crypto';
import { z } from 'zod';
import { env } from './env.js';
import { USER_ROLES } from './types.js';

const tokenPayloadSchema = z.object({
  sub: z.string(),
  role: z.enum(USER_ROLES),
  sessionId: z.string(),
  type: z.enum(['access', 'refresh']),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function createAccessToken(payload: Omit<TokenPayload, 'type'>) {
  return jwt.sign({ ...payload, type: 'access' }, env.JWT_SECRET, {
    expiresIn: env.ACCESS_TOKEN_TTL_SECONDS,
  });
}

export function createRefreshToken(payload: Omit<TokenPayload, 'type'>) {
  return jwt.sign({ ...payload, type: 'refresh' }, env.REFRESH_TOKEN_SECRET, {
    expiresIn: env.REFRESH_TOKEN_TTL_SECONDS,
  });
}

export function verifyAccessToken(token: string): TokenPayload {
  const payload = tokenPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET));
  if (payload.type !== 'access') {
    throw new Error('Not an access token');
  }
  return payload;
}

export function verifyRefreshToken(token: string): TokenPayload {
  return tokenPayloadSchema.parse(jwt.verify(token, env.REFRESH_TOKEN_SECRET));
}

export function randomToken(bytes = 32) {
  return crypto.randomBytes(bytes).toString('hex');
}

export function hashRefreshToken(token: string) {
  return crypto.createHash('sha256').update(token).digest('hex');
}
