import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOnly, adminOrCoach } from '../middleware/requireRole.js';
import { ageOnDate, birthDateBounds, todayIsoDate, toSwimmerResponse } from '../domain/swimmers.js';
import { isCurrentMembership } from '../domain/teams.js';
import { personalBests, toSwimTimeResponse } from '../domain/swimTimes.js';
import { buildSwimmerReport } from '../domain/qualification.js';
import { eventLabel } from '../domain/events.js';
import { loadEventsById } from '../repositories/events.js';
import { loadTeamNames, requireSwimmer, requireTeam } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  escapeFilterValue,
  escapeLikePattern,
  handleSupabaseSingle,
  isUniqueViolation,
} from '../utils/supabase.js';
import { booleanQuery, idParam, isoDate, limitQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import { GENDERS, type SwimmerRow, type SwimmerTeamRow, type SwimTimeRow, type TimeStandardRow } from '../types.js';

const swimmerBodySchema = z.object({
  first_name: z.string().trim().min(1).max(100),
  last_name: z.string().trim().min(1).max(100),
  date_of_birth: isoDate,
  gender: z.enum(GENDERS),
  user_id: z.string().min(1).nullable().optional(),
  usa_swimming_id: z.string().trim().min(1).max(50).nullable().optional(),
  swimcloud_url: z.string().url().nullable().optional(),
});

const updateSwimmerSchema = swimmerBodySchema.partial();

const listSwimmersSchema = z.object({
  name: z.string().optional(),
  gender: z.enum(GENDERS).optional(),
  min_age: z.coerce.number().int().min(0).optional(),
  max_age: z.coerce.number().int().min(0).optional(),
  limit: limitQuery,
});

const membershipBodySchema = z.object({
  team_id: idParam,
  start_date: isoDate.optional(),
});

const endMembershipSchema = z.object({
  end_date: isoDate.optional(),
});

const qualificationsQuerySchema = z.object({
  sanctioning_body: z.string().optional(),
  standard_name: z.string().optional(),
  effective_year: z.coerce.number().int().optional(),
  as_of: isoDate.optional(),
});

const SWIMMER_COLUMNS = 'id, first_name, last_name, date_of_birth, gender, user_id, usa_swimming_id, swimcloud_url';

function nameTerms(name: string) {
  return escapeFilterValue(name)
    .split(/\s+/)
    .filter((term) => term.length > 0);
}

function duplicateUsaId(usaSwimmingId: string | null | undefined) {
  return new HttpError(409, `A swimmer with USA Swimming ID '${usaSwimmingId ?? ''}' already exists`);
}

async function loadSwimTimes(swimmerId: string) {
  return ensureRows<SwimTimeRow>(
    await supabase.from('swim_times').select('*').eq('swimmer_id', swimmerId).order('swim_date', { ascending: true }),
    'Failed to load swim times',
  );
}

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listSwimmersSchema.parse(req.query);

    let query = supabase.from('swimmers').select(SWIMMER_COLUMNS);
    // Every term must match the first or last name.
    for (const term of filters.name ? nameTerms(filters.name) : []) {
      const pattern = `%${escapeLikePattern(term)}%`;
      query = query.or(`first_name.ilike.${pattern},last_name.ilike.${pattern}`);
    }
    if (filters.gender) {
      query = query.eq('gender', filters.gender);
    }

    const bounds = birthDateBounds(todayIsoDate(), filters.min_age, filters.max_age);
    if (bounds.bornOnOrBefore) {
      query = query.lte('date_of_birth', bounds.bornOnOrBefore);
    }
    if (bounds.bornOnOrAfter) {
      query = query.gte('date_of_birth', bounds.bornOnOrAfter);
    }

    const swimmers = ensureRows<SwimmerRow>(
      await query
        .order('last_name', { ascending: true })
        .order('first_name', { ascending: true })
        .limit(filters.limit),
      'Failed to load swimmers',
    );

    const today = todayIsoDate();
    res.json(swimmers.map((swimmer) => toSwimmerResponse(swimmer, today)));
  } catch (error) {
    next(error);
  }
});

router.get('/:swimmerId', async (req, res, next) => {
  try {
    const swimmer = await requireSwimmer(idParam.parse(req.params.swimmerId));
    res.json(toSwimmerResponse(swimmer));
  } catch (error) {
    next(error);
  }
});

router.post('/', adminOrCoach, async (req, res, next) => {
  try {
    const payload = swimmerBodySchema.parse(req.body ?? {});

    const insert = await supabase
      .from('swimmers')
      .insert({
        first_name: payload.first_name,
        last_name: payload.last_name,
        date_of_birth: payload.date_of_birth,
        gender: payload.gender,
        user_id: payload.user_id ?? null,
        usa_swimming_id: payload.usa_swimming_id ?? null,
        swimcloud_url: payload.swimcloud_url ?? null,
      })
      .select(SWIMMER_COLUMNS)
      .maybeSingle();

    if (isUniqueViolation(insert.error)) {
      throw duplicateUsaId(payload.usa_swimming_id);
    }
    const swimmer = handleSupabaseSingle<SwimmerRow>(insert, 'Failed to create swimmer');

    logger.info('swimmer_created', { swimmerId: swimmer.id });
    res.status(201).json(toSwimmerResponse(swimmer));
  } catch (error) {
    next(error);
  }
});

router.patch('/:swimmerId', adminOrCoach, async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    const existing = await requireSwimmer(swimmerId);
    const updates = updateSwimmerSchema.parse(req.body ?? {});

    if (Object.keys(updates).length === 0) {
      res.json(toSwimmerResponse(existing));
      return;
    }

    const update = await supabase
      .from('swimmers')
      .update(updates)
      .eq('id', swimmerId)
      .select(SWIMMER_COLUMNS)
      .maybeSingle();

    if (isUniqueViolation(update.error)) {
      throw duplicateUsaId(updates.usa_swimming_id);
    }
    const swimmer = handleSupabaseSingle<SwimmerRow>(update, 'Failed to update swimmer');

    logger.info('swimmer_updated', { swimmerId, fields: Object.keys(updates) });
    res.json(toSwimmerResponse(swimmer));
  } catch (error) {
    next(error);
  }
});

router.delete('/:swimmerId', adminOnly, async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    await requireSwimmer(swimmerId);

    ensureOk(await supabase.from('swimmers').delete().eq('id', swimmerId), 'Failed to delete swimmer');

    logger.info('swimmer_deleted', { swimmerId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

router.get('/:swimmerId/teams', async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    const { current_only: currentOnly } = z.object({ current_only: booleanQuery(true) }).parse(req.query);
    await requireSwimmer(swimmerId);

    const memberships = ensureRows<SwimmerTeamRow>(
      await supabase
        .from('swimmer_teams')
        .select('id, swimmer_id, team_id, start_date, end_date')
        .eq('swimmer_id', swimmerId)
        .order('start_date', { ascending: false }),
      'Failed to load memberships',
    );

    const today = todayIsoDate();
    const teamNames = await loadTeamNames(memberships.map((membership) => membership.team_id));

    res.json(
      memberships
        .map((membership) => ({
          ...membership,
          team_name: teamNames.get(membership.team_id) ?? null,
          is_current: isCurrentMembership(membership, today),
        }))
        .filter((membership) => !currentOnly || membership.is_current),
    );
  } catch (error) {
    next(error);
  }
});

router.post('/:swimmerId/teams', adminOrCoach, async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    const payload = membershipBodySchema.parse(req.body ?? {});
    await requireSwimmer(swimmerId);
    const team = await requireTeam(payload.team_id);
    const today = todayIsoDate();

    const existing = ensureRows<SwimmerTeamRow>(
      await supabase
        .from('swimmer_teams')
        .select('id, swimmer_id, team_id, start_date, end_date')
        .eq('swimmer_id', swimmerId)
        .eq('team_id', team.id),
      'Failed to load memberships',
    );

    if (existing.some((membership) => isCurrentMembership(membership, today))) {
      throw new HttpError(409, `Swimmer is already a current member of '${team.name}'`);
    }

    const membership = handleSupabaseSingle<SwimmerTeamRow>(
      await supabase
        .from('swimmer_teams')
        .insert({ swimmer_id: swimmerId, team_id: team.id, start_date: payload.start_date ?? today, end_date: null })
        .select('id, swimmer_id, team_id, start_date, end_date')
        .maybeSingle(),
      'Failed to add swimmer to team',
    );

    logger.info('swimmer_joined_team', { swimmerId, teamId: team.id });
    res.status(201).json({ ...membership, team_name: team.name, is_current: true });
  } catch (error) {
    next(error);
  }
});

router.delete('/:swimmerId/teams/:teamId', adminOrCoach, async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    const teamId = idParam.parse(req.params.teamId);
    const { end_date: endDate } = endMembershipSchema.parse(req.query);
    await requireSwimmer(swimmerId);
    const team = await requireTeam(teamId);
    const today = todayIsoDate();

    const memberships = ensureRows<SwimmerTeamRow>(
      await supabase
        .from('swimmer_teams')
        .select('id, swimmer_id, team_id, start_date, end_date')
        .eq('swimmer_id', swimmerId)
        .eq('team_id', teamId),
      'Failed to load memberships',
    );

    const current = memberships.find((membership) => isCurrentMembership(membership, today));
    if (!current) {
      throw new HttpError(404, `Swimmer is not a current member of '${team.name}'`);
    }

    const ended = handleSupabaseSingle<SwimmerTeamRow>(
      await supabase
        .from('swimmer_teams')
        .update({ end_date: endDate ?? today })
        .eq('id', current.id)
        .select('id, swimmer_id, team_id, start_date, end_date')
        .maybeSingle(),
      'Failed to end membership',
    );

    logger.info('swimmer_left_team', { swimmerId, teamId, endDate: ended.end_date });
    res.json({ ...ended, team_name: team.name, is_current: isCurrentMembership(ended, today) });
  } catch (error) {
    next(error);
  }
});

router.get('/:swimmerId/personal-bests', async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    await requireSwimmer(swimmerId);

    const bests = personalBests(await loadSwimTimes(swimmerId));
    const events = await loadEventsById(bests.map((swim) => swim.event_id));

    res.json(
      bests
        .map((swim) => {
          const event = events.get(swim.event_id);
          return {
            ...toSwimTimeResponse(swim),
            event: event ? { ...event, label: eventLabel(event) } : null,
          };
        })
        .sort((a, b) => (a.event?.label ?? '').localeCompare(b.event?.label ?? '')),
    );
  } catch (error) {
    next(error);
  }
});

router.get('/:swimmerId/qualifications', async (req, res, next) => {
  try {
    const swimmerId = idParam.parse(req.params.swimmerId);
    const filters = qualificationsQuerySchema.parse(req.query);
    const swimmer = await requireSwimmer(swimmerId);
    const asOf = filters.as_of ?? todayIsoDate();
    const age = ageOnDate(swimmer.date_of_birth, asOf);

    let query = supabase.from('time_standards').select('*').eq('gender', swimmer.gender);
    if (filters.sanctioning_body) query = query.ilike('sanctioning_body', escapeLikePattern(filters.sanctioning_body));
    if (filters.standard_name) query = query.ilike('standard_name', escapeLikePattern(filters.standard_name));
    if (filters.effective_year !== undefined) query = query.eq('effective_year', filters.effective_year);

    const standards = ensureRows<TimeStandardRow>(await query, 'Failed to load time standards');
    const swims = await loadSwimTimes(swimmerId);
    const events = await loadEventsById(standards.map((standard) => standard.event_id));

    res.json({
      swimmer: toSwimmerResponse(swimmer, asOf),
      as_of: asOf,
      age,
      groups: buildSwimmerReport({ gender: swimmer.gender, age, standards, events, swims }),
    });
  } catch (error) {
    next(error);
  }
});

export default router;
