import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOnly, adminOrCoach } from '../middleware/requireRole.js';
import { loadTeamNames, requireMeet, requireTeam } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  escapeLikePattern,
  handleSupabaseMaybe,
  handleSupabaseSingle,
  isForeignKeyViolation,
  isUniqueViolation,
} from '../utils/supabase.js';
import { idParam, isoDate, limitQuery, optionalBooleanQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import { COURSES, MEET_TYPES, type MeetRow, type MeetTeamRow } from '../types.js';

const LANE_COUNTS = [6, 8, 10] as const;

const meetFieldsSchema = z.object({
  name: z.string().trim().min(1).max(200),
  location: z.string().trim().min(1).max(200),
  city: z.string().trim().min(1).max(100),
  state: z.string().trim().max(50).nullable().optional(),
  country: z.string().trim().min(1).max(50).default('USA'),
  start_date: isoDate,
  end_date: isoDate.nullable().optional(),
  course: z.enum(COURSES),
  lanes: z
    .number()
    .int()
    .refine((value) => LANE_COUNTS.some((lanes) => lanes === value), 'Lanes must be 6, 8 or 10')
    .default(6),
  indoor: z.boolean().default(true),
  sanctioning_body: z.string().trim().min(1).max(100),
  meet_type: z.enum(MEET_TYPES),
});

function endNotBeforeStart(meet: { start_date?: string; end_date?: string | null }) {
  return !meet.start_date || !meet.end_date || meet.end_date >= meet.start_date;
}

const createMeetSchema = meetFieldsSchema.refine(endNotBeforeStart, {
  message: 'end_date cannot be before start_date',
  path: ['end_date'],
});

// Defaults only apply on create.
const updateMeetSchema = meetFieldsSchema
  .extend({
    country: z.string().trim().min(1).max(50),
    lanes: z
      .number()
      .int()
      .refine((value) => LANE_COUNTS.some((lanes) => lanes === value), 'Lanes must be 6, 8 or 10'),
    indoor: z.boolean(),
  })
  .partial();

const listMeetsSchema = z.object({
  name: z.string().optional(),
  course: z.enum(COURSES).optional(),
  meet_type: z.enum(MEET_TYPES).optional(),
  sanctioning_body: z.string().optional(),
  start_after: isoDate.optional(),
  start_before: isoDate.optional(),
  indoor: optionalBooleanQuery,
  limit: limitQuery,
});

const meetTeamSchema = z.object({
  team_id: idParam,
  is_host: z.boolean().default(false),
});

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listMeetsSchema.parse(req.query);

    let query = supabase.from('meets').select('*');
    if (filters.name) query = query.ilike('name', `%${escapeLikePattern(filters.name)}%`);
    if (filters.course) query = query.eq('course', filters.course);
    if (filters.meet_type) query = query.eq('meet_type', filters.meet_type);
    if (filters.sanctioning_body) query = query.eq('sanctioning_body', filters.sanctioning_body);
    if (filters.start_after) query = query.gte('start_date', filters.start_after);
    if (filters.start_before) query = query.lte('start_date', filters.start_before);
    if (filters.indoor !== undefined) query = query.eq('indoor', filters.indoor);

    const meets = ensureRows<MeetRow>(
      await query.order('start_date', { ascending: false }).limit(filters.limit),
      'Failed to load meets',
    );

    res.json(meets);
  } catch (error) {
    next(error);
  }
});

router.get('/:meetId', async (req, res, next) => {
  try {
    res.json(await requireMeet(idParam.parse(req.params.meetId)));
  } catch (error) {
    next(error);
  }
});

router.post('/', adminOrCoach, async (req, res, next) => {
  try {
    const payload = createMeetSchema.parse(req.body ?? {});

    const meet = handleSupabaseSingle<MeetRow>(
      await supabase
        .from('meets')
        .insert({ ...payload, state: payload.state ?? null, end_date: payload.end_date ?? null })
        .select('*')
        .maybeSingle(),
      'Failed to create meet',
    );

    logger.info('meet_created', { meetId: meet.id, name: meet.name, course: meet.course });
    res.status(201).json(meet);
  } catch (error) {
    next(error);
  }
});

router.patch('/:meetId', adminOrCoach, async (req, res, next) => {
  try {
    const meetId = idParam.parse(req.params.meetId);
    const existing = await requireMeet(meetId);
    const updates = updateMeetSchema.parse(req.body ?? {});

    const merged = {
      start_date: updates.start_date ?? existing.start_date,
      end_date: updates.end_date !== undefined ? updates.end_date : existing.end_date,
    };
    if (!endNotBeforeStart(merged)) {
      throw new HttpError(400, 'end_date cannot be before start_date');
    }

    if (Object.keys(updates).length === 0) {
      res.json(existing);
      return;
    }

    const meet = handleSupabaseSingle<MeetRow>(
      await supabase.from('meets').update(updates).eq('id', meetId).select('*').maybeSingle(),
      'Failed to update meet',
    );

    logger.info('meet_updated', { meetId, fields: Object.keys(updates) });
    res.json(meet);
  } catch (error) {
    next(error);
  }
});

router.delete('/:meetId', adminOnly, async (req, res, next) => {
  try {
    const meetId = idParam.parse(req.params.meetId);
    const existing = await requireMeet(meetId);

    const removal = await supabase.from('meets').delete().eq('id', meetId);
    if (isForeignKeyViolation(removal.error)) {
      throw new HttpError(409, `Meet '${existing.name}' has recorded swim times and cannot be deleted`);
    }
    ensureOk(removal, 'Failed to delete meet');

    logger.info('meet_deleted', { meetId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

router.get('/:meetId/teams', async (req, res, next) => {
  try {
    const meetId = idParam.parse(req.params.meetId);
    await requireMeet(meetId);

    const entries = ensureRows<MeetTeamRow>(
      await supabase.from('meet_teams').select('id, meet_id, team_id, is_host').eq('meet_id', meetId),
      'Failed to load meet teams',
    );
    const names = await loadTeamNames(entries.map((entry) => entry.team_id));

    res.json(
      entries
        .map((entry) => ({ ...entry, team_name: names.get(entry.team_id) ?? null }))
        .sort((a, b) => Number(b.is_host) - Number(a.is_host) || (a.team_name ?? '').localeCompare(b.team_name ?? '')),
    );
  } catch (error) {
    next(error);
  }
});

router.post('/:meetId/teams', adminOrCoach, async (req, res, next) => {
  try {
    const meetId = idParam.parse(req.params.meetId);
    const payload = meetTeamSchema.parse(req.body ?? {});
    await requireMeet(meetId);
    const team = await requireTeam(payload.team_id);

    const insert = await supabase
      .from('meet_teams')
      .insert({ meet_id: meetId, team_id: team.id, is_host: payload.is_host })
      .select('id, meet_id, team_id, is_host')
      .maybeSingle();

    if (isUniqueViolation(insert.error)) {
      throw new HttpError(409, `Team '${team.name}' is already in this meet`);
    }
    const entry = handleSupabaseSingle<MeetTeamRow>(insert, 'Failed to add team to meet');

    logger.info('meet_team_added', { meetId, teamId: team.id, isHost: entry.is_host });
    res.status(201).json({ ...entry, team_name: team.name });
  } catch (error) {
    next(error);
  }
});

router.delete('/:meetId/teams/:teamId', adminOrCoach, async (req, res, next) => {
  try {
    const meetId = idParam.parse(req.params.meetId);
    const teamId = idParam.parse(req.params.teamId);

    const entry = handleSupabaseMaybe<MeetTeamRow>(
      await supabase
        .from('meet_teams')
        .select('id, meet_id, team_id, is_host')
        .eq('meet_id', meetId)
        .eq('team_id', teamId)
        .maybeSingle(),
      'Failed to load meet team',
    );

    if (!entry) {
      throw new HttpError(404, 'Team is not in this meet');
    }

    ensureOk(await supabase.from('meet_teams').delete().eq('id', entry.id), 'Failed to remove team from meet');

    logger.info('meet_team_removed', { meetId, teamId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
