import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate, requireAuth } from '../middleware/authenticate.js';
import { requireRole } from '../middleware/requireRole.js';
import { canRemoveFollow, followResponder, isFollowRequest } from '../domain/permissions.js';
import { findUser } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import { ensureOk, ensureRows, handleSupabaseMaybe, handleSupabaseSingle } from '../utils/supabase.js';
import { idParam } from '../utils/query.js';
import { logger } from '../logger.js';
import type { FanFollowRow, UserRole } from '../types.js';

const FOLLOW_COLUMNS = 'id, fan_id, swimmer_id, initiated_by, status, created_at, responded_at';

const followRequestSchema = z.object({ swimmer_id: idParam });
const followInviteSchema = z.object({ fan_id: idParam });
const respondSchema = z.object({ approved: z.boolean() });

async function findFollow(fanId: string, swimmerId: string) {
  return handleSupabaseMaybe<FanFollowRow>(
    await supabase
      .from('fan_follows')
      .select(FOLLOW_COLUMNS)
      .eq('fan_id', fanId)
      .eq('swimmer_id', swimmerId)
      .maybeSingle(),
    'Failed to load follow',
  );
}

/**
 * Creates a pending follow, or reopens a denied one. Approved and pending
 * relationships are conflicts.
 */
async function openFollow(
  fanId: string,
  swimmerId: string,
  initiatedBy: string,
  conflicts: { approved: string; pending: string },
) {
  const existing = await findFollow(fanId, swimmerId);
  if (existing?.status === 'approved') {
    throw new HttpError(409, conflicts.approved);
  }
  if (existing?.status === 'pending') {
    throw new HttpError(409, conflicts.pending);
  }

  if (existing) {
    return handleSupabaseSingle<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .update({ status: 'pending', initiated_by: initiatedBy, responded_at: null })
        .eq('id', existing.id)
        .select(FOLLOW_COLUMNS)
        .maybeSingle(),
      'Failed to reopen follow',
    );
  }

  return handleSupabaseSingle<FanFollowRow>(
    await supabase
      .from('fan_follows')
      .insert({ fan_id: fanId, swimmer_id: swimmerId, initiated_by: initiatedBy, status: 'pending' })
      .select(FOLLOW_COLUMNS)
      .maybeSingle(),
    'Failed to create follow',
  );
}

async function requireUserWithRole(userId: string, role: UserRole, notFound: string) {
  const user = await findUser(userId);
  if (!user || !user.active) {
    throw new HttpError(404, notFound);
  }
  if (user.role !== role) {
    const action = role === 'swimmer' ? 'follow' : 'invite';
    throw new HttpError(400, `Can only ${action} users with role: ${role}`);
  }
  return user;
}

const router = Router();

router.use(authenticate);

router.post('/request', requireRole('fan'), async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const { swimmer_id: swimmerId } = followRequestSchema.parse(req.body ?? {});
    await requireUserWithRole(swimmerId, 'swimmer', 'Swimmer not found');

    const follow = await openFollow(auth.userId, swimmerId, auth.userId, {
      approved: 'Already following this swimmer',
      pending: 'Follow request already pending',
    });

    logger.info('follow_requested', { followId: follow.id, fanId: auth.userId, swimmerId });
    res.status(201).json(follow);
  } catch (error) {
    next(error);
  }
});

router.post('/invite', requireRole('swimmer'), async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const { fan_id: fanId } = followInviteSchema.parse(req.body ?? {});
    await requireUserWithRole(fanId, 'fan', 'Fan not found');

    const follow = await openFollow(fanId, auth.userId, auth.userId, {
      approved: 'This fan is already following you',
      pending: 'Invite already pending',
    });

    logger.info('fan_invited', { followId: follow.id, swimmerId: auth.userId, fanId });
    res.status(201).json(follow);
  } catch (error) {
    next(error);
  }
});

router.get('/following', requireRole('fan'), async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const follows = ensureRows<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .select(FOLLOW_COLUMNS)
        .eq('fan_id', auth.userId)
        .eq('status', 'approved')
        .order('created_at', { ascending: false }),
      'Failed to load follows',
    );
    res.json(follows);
  } catch (error) {
    next(error);
  }
});

router.get('/followers', requireRole('swimmer'), async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const follows = ensureRows<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .select(FOLLOW_COLUMNS)
        .eq('swimmer_id', auth.userId)
        .eq('status', 'approved')
        .order('created_at', { ascending: false }),
      'Failed to load followers',
    );
    res.json(follows);
  } catch (error) {
    next(error);
  }
});

router.get('/requests', requireRole('swimmer'), async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const follows = ensureRows<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .select(FOLLOW_COLUMNS)
        .eq('swimmer_id', auth.userId)
        .eq('status', 'pending')
        .neq('initiated_by', auth.userId)
        .order('created_at', { ascending: false }),
      'Failed to load follow requests',
    );
    res.json(follows);
  } catch (error) {
    next(error);
  }
});

router.post('/:followId/respond', async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const followId = idParam.parse(req.params.followId);
    const { approved } = respondSchema.parse(req.body ?? {});

    const follow = handleSupabaseMaybe<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .select(FOLLOW_COLUMNS)
        .eq('id', followId)
        .eq('status', 'pending')
        .maybeSingle(),
      'Failed to load follow',
    );
    if (!follow) {
      throw new HttpError(404, 'Pending follow request not found');
    }

    if (followResponder(follow) !== auth.userId) {
      throw new HttpError(
        403,
        isFollowRequest(follow)
          ? 'Only the swimmer can respond to this request'
          : 'Only the fan can respond to this invite',
      );
    }

    const status = approved ? 'approved' : 'denied';
    const updated = handleSupabaseSingle<FanFollowRow>(
      await supabase
        .from('fan_follows')
        .update({ status, responded_at: new Date().toISOString() })
        .eq('id', followId)
        .select(FOLLOW_COLUMNS)
        .maybeSingle(),
      'Failed to update follow',
    );

    logger.info('follow_responded', { followId, status, responderId: auth.userId });
    res.json(updated);
  } catch (error) {
    next(error);
  }
});

router.delete('/:followId', async (req, res, next) => {
  try {
    const auth = requireAuth(req);
    const followId = idParam.parse(req.params.followId);

    const follow = handleSupabaseMaybe<FanFollowRow>(
      await supabase.from('fan_follows').select(FOLLOW_COLUMNS).eq('id', followId).maybeSingle(),
      'Failed to load follow',
    );
    if (!follow) {
      throw new HttpError(404, 'Follow not found');
    }
    if (!canRemoveFollow(follow, auth.userId, auth.role)) {
      throw new HttpError(403, 'Cannot modify this follow relationship');
    }

    ensureOk(await supabase.from('fan_follows').delete().eq('id', followId), 'Failed to remove follow');

    logger.info('follow_removed', {
      followId,
      fanId: follow.fan_id,
      swimmerId: follow.swimmer_id,
      removedBy: auth.userId,
    });
    res.json({ message: 'Unfollowed' });
  } catch (error) {
    next(error);
  }
});

export default router;
