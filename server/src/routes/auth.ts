import { Router, type Request } from 'express';
import { z } from 'zod';
import { randomUUID } from 'node:crypto';
import { supabase } from '../supabase.js';
import { hashPassword, verifyPassword } from '../utils/passwords.js';
import {
  createAccessToken,
  createRefreshToken,
  hashRefreshToken,
  randomToken,
  verifyRefreshToken,
} from '../tokens.js';
import { env } from '../env.js';
import { HttpError } from '../utils/errors.js';
import { ensureOk, ensureRows, handleSupabaseMaybe, handleSupabaseSingle, isUniqueViolation } from '../utils/supabase.js';
import { authenticate, requireAuth } from '../middleware/authenticate.js';
import { adminOnly } from '../middleware/requireRole.js';
import { canInviteRole } from '../domain/permissions.js';
import { findUser } from '../repositories/lookups.js';
import { idParam } from '../utils/query.js';
import { logger } from '../logger.js';
import {
  INVITATION_STATUSES,
  USER_ROLES,
  type InvitationRow,
  type UserRow,
  type UserSessionRow,
} from '../types.js';

const USER_COLUMNS = 'id, email, password_hash, display_name, role, swimmer_id, active, last_login_at, created_at';
const INVITATION_COLUMNS =
  'id, inviter_id, email, role, token, status, expires_at, accepted_by, accepted_at, team_id, created_at';

const signupSchema = z.object({
  email: z.string().email(),
  password: z.string().min(8),
  display_name: z.string().trim().min(1).max(200).optional(),
  invitation_token: z.string().min(10),
  device_name: z.string().min(1).max(200).optional(),
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  device_name: z.string().min(1).max(200).optional(),
});

const refreshSchema = z.object({
  refresh_token: z.string().min(10),
});

const logoutSchema = z.object({
  all_devices: z.boolean().optional(),
});

const createInvitationSchema = z.object({
  email: z.string().email(),
  role: z.enum(USER_ROLES),
  team_id: z.string().min(1).nullable().optional(),
});

const listInvitationsSchema = z.object({
  status: z.enum(INVITATION_STATUSES).optional(),
});

const roleChangeSchema = z.object({
  role: z.enum(USER_ROLES),
});

function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

function toUserResponse(user: UserRow) {
  return {
    id: user.id,
    email: user.email,
    displayName: user.display_name,
    role: user.role,
    swimmerId: user.swimmer_id,
    active: user.active,
  };
}

async function findUserByEmail(email: string) {
  return handleSupabaseMaybe<UserRow>(
    await supabase.from('users').select(USER_COLUMNS).eq('email', email).maybeSingle(),
    'Failed to load user',
  );
}

async function issueSession(user: UserRow, req: Request, deviceName?: string) {
  const sessionId = randomUUID();
  const tokenPayload = { sub: user.id, role: user.role, sessionId } as const;
  const accessToken = createAccessToken(tokenPayload);
  const refreshToken = createRefreshToken(tokenPayload);

  const sessionInsert = await supabase.from('user_sessions').insert({
    id: sessionId,
    user_id: user.id,
    role: user.role,
    refresh_token_hash: hashRefreshToken(refreshToken),
    expires_at: new Date(Date.now() + env.REFRESH_TOKEN_TTL_SECONDS * 1000).toISOString(),
    device_info: deviceName ?? null,
    created_ip: req.ip ?? null,
  });

  if (sessionInsert.error) {
    throw new HttpError(500, 'Failed to create session', sessionInsert.error);
  }

  return {
    accessToken,
    refreshToken,
    expiresIn: env.ACCESS_TOKEN_TTL_SECONDS,
    refreshExpiresIn: env.REFRESH_TOKEN_TTL_SECONDS,
    user: toUserResponse(user),
  };
}

const router = Router();

router.post('/signup', async (req, res, next) => {
  try {
    const payload = signupSchema.parse(req.body ?? {});
    const email = normalizeEmail(payload.email);

    const invitation = handleSupabaseMaybe<InvitationRow>(
      await supabase.from('invitations').select(INVITATION_COLUMNS).eq('token', payload.invitation_token).maybeSingle(),
      'Failed to load invitation',
    );

    if (!invitation || invitation.status !== 'pending') {
      throw new HttpError(400, 'Invalid or expired invitation token');
    }

    if (new Date(invitation.expires_at).getTime() < Date.now()) {
      ensureOk(
        await supabase.from('invitations').update({ status: 'expired' }).eq('id', invitation.id),
        'Failed to expire invitation',
      );
      throw new HttpError(400, 'Invitation has expired');
    }

    if (normalizeEmail(invitation.email) !== email) {
      throw new HttpError(400, 'Email does not match invitation');
    }

    const insert = await supabase
      .from('users')
      .insert({
        email,
        password_hash: await hashPassword(payload.password),
        display_name: payload.display_name ?? null,
        role: invitation.role,
        active: true,
      })
      .select(USER_COLUMNS)
      .maybeSingle();

    if (isUniqueViolation(insert.error)) {
      throw new HttpError(409, 'An account with this email already exists');
    }
    const user = handleSupabaseSingle<UserRow>(insert, 'Failed to create account');

    ensureOk(
      await supabase
        .from('invitations')
        .update({ status: 'accepted', accepted_by: user.id, accepted_at: new Date().toISOString() })
        .eq('id', invitation.id),
      'Failed to accept invitation',
    );

    logger.info('user_signed_up', { userId: user.id, role: user.role, invitationId: invitation.id });
    res.status(201).json(await issueSession(user, req, payload.device_name));
  } catch (error) {
    next(error);
  }
});

router.post('/login', async (req, res, next) => {
  try {
    const { email, password, device_name: deviceName } = loginSchema.parse(req.body ?? {});
    const user = await findUserByEmail(normalizeEmail(email));

    if (!user) {
      throw new HttpError(401, 'Invalid email or password');
    }

    if (!user.active) {
      throw new HttpError(403, 'User disabled');
    }

    let passwordOk = false;
    try {
      passwordOk = await verifyPassword(user.password_hash, password);
    } catch (error) {
      return next(new HttpError(500, 'Failed to verify credentials', error));
    }

    if (!passwordOk) {
      logger.warn('login_failed', { userId: user.id });
      throw new HttpError(401, 'Invalid email or password');
    }

    const session = await issueSession(user, req, deviceName);

    const touch = await supabase.from('users').update({ last_login_at: new Date().toISOString() }).eq('id', user.id);
    if (touch.error) {
      logger.warn('last_login_update_failed', { userId: user.id, error: touch.error.message });
    }

    logger.info('user_logged_in', { userId: user.id, role: user.role });
    res.json(session);
  } catch (error) {
    next(error);
  }
});

router.post('/refresh', async (req, res, next) => {
  try {
    const { refresh_token: refreshToken } = refreshSchema.parse(req.body ?? {});

    let payload;
    try {
      payload = verifyRefreshToken(refreshToken);
    } catch (error) {
      throw new HttpError(401, 'Invalid refresh token', error instanceof Error ? error.message : undefined);
    }

    if (payload.type !== 'refresh') {
      throw new HttpError(401, 'Invalid refresh token');
    }

    const session = handleSupabaseMaybe<UserSessionRow>(
      await supabase
        .from('user_sessions')
        .select('id, user_id, role, refresh_token_hash, expires_at, revoked_at')
        .eq('id', payload.sessionId)
        .eq('user_id', payload.sub)
        .maybeSingle(),
      'Session not found',
    );

    if (!session) {
      throw new HttpError(401, 'Session not found');
    }

    if (session.revoked_at) {
      throw new HttpError(401, 'Session revoked');
    }

    if (new Date(session.expires_at).getTime() < Date.now()) {
      throw new HttpError(401, 'Session expired');
    }

    if (hashRefreshToken(refreshToken) !== session.refresh_token_hash) {
      throw new HttpError(401, 'Refresh token mismatch');
    }

    const user = await findUser(payload.sub);
    if (!user) {
      throw new HttpError(401, 'User not found');
    }

    if (!user.active) {
      throw new HttpError(403, 'User disabled');
    }

    const tokenPayload = { sub: user.id, role: user.role, sessionId: session.id } as const;
    const newAccessToken = createAccessToken(tokenPayload);
    const newRefreshToken = createRefreshToken(tokenPayload);

    const update = await supabase
      .from('user_sessions')
      .update({
        role: user.role,
        refresh_token_hash: hashRefreshToken(newRefreshToken),
        expires_at: new Date(Date.now() + env.REFRESH_TOKEN_TTL_SECONDS * 1000).toISOString(),
      })
      .eq('id', session.id);

    if (update.error) {
      throw new HttpError(500, 'Failed to update session', update.error);
    }

    res.json({
      accessToken: newAccessToken,
      refreshToken: newRefreshToken,
      expiresIn: env.ACCESS_TOKEN_TTL_SECONDS,
      refreshExpiresIn: env.REFRESH_TOKEN_TTL_SECONDS,
      user: toUserResponse(user),
    });
  } catch (error) {
    next(error);
  }
});

router.get('/me', authenticate, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const user = await findUser(auth.userId);
    if (!user) {
      throw new HttpError(404, 'User not found');
    }
    res.json(toUserResponse(user));
  } catch (error) {
    next(error);
  }
});

router.post('/logout', authenticate, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const { all_devices: allDevices } = logoutSchema.parse(req.body ?? {});

    if (allDevices) {
      const update = await supabase
        .from('user_sessions')
        .update({ revoked_at: new Date().toISOString() })
        .eq('user_id', auth.userId)
        .is('revoked_at', null);

      if (update.error) {
        throw new HttpError(500, 'Failed to revoke sessions', update.error);
      }
    } else {
      const update = await supabase
        .from('user_sessions')
        .update({ revoked_at: new Date().toISOString() })
        .eq('id', auth.sessionId);

      if (update.error) {
        throw new HttpError(500, 'Failed to revoke session', update.error);
      }
    }

    logger.info('user_logged_out', { userId: auth.userId, allDevices: Boolean(allDevices) });
    res.json({ success: true });
  } catch (error) {
    next(error);
  }
});

router.post('/invitations', authenticate, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const payload = createInvitationSchema.parse(req.body ?? {});
    const email = normalizeEmail(payload.email);

    if (!canInviteRole(auth.role, payload.role)) {
      throw new HttpError(403, `You cannot invite users with role: ${payload.role}`);
    }

    if (await findUserByEmail(email)) {
      throw new HttpError(409, 'A user with this email already exists');
    }

    const pending = ensureRows<Pick<InvitationRow, 'id'>>(
      await supabase.from('invitations').select('id').eq('email', email).eq('status', 'pending'),
      'Failed to check invitations',
    );
    if (pending.length > 0) {
      throw new HttpError(409, 'Pending invitation already exists for this email');
    }

    const expiresAt = new Date(Date.now() + env.INVITATION_TTL_DAYS * 24 * 60 * 60 * 1000).toISOString();
    const invitation = handleSupabaseSingle<InvitationRow>(
      await supabase
        .from('invitations')
        .insert({
          inviter_id: auth.userId,
          email,
          role: payload.role,
          token: randomToken(32),
          status: 'pending',
          expires_at: expiresAt,
          team_id: payload.team_id ?? null,
        })
        .select(INVITATION_COLUMNS)
        .maybeSingle(),
      'Failed to create invitation',
    );

    logger.info('invitation_created', { invitationId: invitation.id, inviterId: auth.userId, role: invitation.role });
    res.status(201).json(invitation);
  } catch (error) {
    next(error);
  }
});

router.get('/invitations', authenticate, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const { status } = listInvitationsSchema.parse(req.query);

    let query = supabase.from('invitations').select(INVITATION_COLUMNS);
    if (auth.role !== 'admin') query = query.eq('inviter_id', auth.userId);
    if (status) query = query.eq('status', status);

    const invitations = ensureRows<InvitationRow>(
      await query.order('created_at', { ascending: false }),
      'Failed to load invitations',
    );
    res.json(invitations);
  } catch (error) {
    next(error);
  }
});

router.delete('/invitations/:invitationId', authenticate, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const invitationId = idParam.parse(req.params.invitationId);

    const invitation = handleSupabaseMaybe<InvitationRow>(
      await supabase.from('invitations').select(INVITATION_COLUMNS).eq('id', invitationId).maybeSingle(),
      'Failed to load invitation',
    );
    if (!invitation) {
      throw new HttpError(404, 'Invitation not found');
    }

    if (invitation.inviter_id !== auth.userId && auth.role !== 'admin') {
      throw new HttpError(403, "Cannot revoke another user's invitation");
    }

    if (invitation.status !== 'pending') {
      throw new HttpError(400, `Cannot revoke invitation with status: ${invitation.status}`);
    }

    const revoked = handleSupabaseSingle<InvitationRow>(
      await supabase
        .from('invitations')
        .update({ status: 'revoked' })
        .eq('id', invitationId)
        .select(INVITATION_COLUMNS)
        .maybeSingle(),
      'Failed to revoke invitation',
    );

    logger.info('invitation_revoked', { invitationId, revokedBy: auth.userId });
    res.json(revoked);
  } catch (error) {
    next(error);
  }
});

router.get('/users', authenticate, adminOnly, async (_req, res, next) => {
  try {
    const users = ensureRows<UserRow>(
      await supabase.from('users').select(USER_COLUMNS).order('email', { ascending: true }),
      'Failed to load users',
    );
    res.json(users.map(toUserResponse));
  } catch (error) {
    next(error);
  }
});

router.patch('/users/:userId/role', authenticate, adminOnly, async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const userId = idParam.parse(req.params.userId);
    const { role } = roleChangeSchema.parse(req.body ?? {});

    if (userId === auth.userId) {
      throw new HttpError(400, 'Cannot change your own role');
    }

    const existing = await findUser(userId);
    if (!existing) {
      throw new HttpError(404, 'User not found');
    }

    const user = handleSupabaseSingle<UserRow>(
      await supabase.from('users').update({ role }).eq('id', userId).select(USER_COLUMNS).maybeSingle(),
      'Failed to update role',
    );

    // Tokens carry the role, so existing sessions must sign in again.
    ensureOk(
      await supabase
        .from('user_sessions')
        .update({ revoked_at: new Date().toISOString() })
        .eq('user_id', userId)
        .is('revoked_at', null),
      'Failed to revoke sessions',
    );

    logger.info('user_role_changed', { userId, from: existing.role, to: role, changedBy: auth.userId });
    res.json(toUserResponse(user));
  } catch (error) {
    next(error);
  }
});

export default router;
