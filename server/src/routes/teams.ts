import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOnly } from '../middleware/requireRole.js';
import { validateTeamFields } from '../domain/teams.js';
import { requireTeam } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  escapeLikePattern,
  handleSupabaseSingle,
  isForeignKeyViolation,
  isUniqueViolation,
} from '../utils/supabase.js';
import { idParam, limitQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import { TEAM_TYPES, type TeamRow } from '../types.js';

const teamBodySchema = z.object({
  name: z.string().trim().min(1).max(200),
  team_type: z.enum(TEAM_TYPES),
  sanctioning_body: z.string().trim().min(1).max(100),
  lsc: z.string().trim().max(10).nullable().optional(),
  division: z.string().trim().max(50).nullable().optional(),
  state: z.string().trim().max(50).nullable().optional(),
  country: z.string().trim().max(50).nullable().optional(),
});

const updateTeamSchema = teamBodySchema.partial();

const listTeamsSchema = z.object({
  team_type: z.enum(TEAM_TYPES).optional(),
  name: z.string().optional(),
  sanctioning_body: z.string().optional(),
  lsc: z.string().optional(),
  division: z.string().optional(),
  state: z.string().optional(),
  country: z.string().optional(),
  limit: limitQuery,
  offset: z.coerce.number().int().min(0).default(0),
});

const TEAM_COLUMNS = 'id, name, team_type, sanctioning_body, lsc, division, state, country';

function duplicateName(name: string) {
  return new HttpError(409, `A team named '${name}' already exists`);
}

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listTeamsSchema.parse(req.query);

    let query = supabase.from('teams').select(TEAM_COLUMNS);
    if (filters.team_type) query = query.eq('team_type', filters.team_type);
    if (filters.name) query = query.ilike('name', `%${escapeLikePattern(filters.name)}%`);
    if (filters.sanctioning_body) query = query.eq('sanctioning_body', filters.sanctioning_body);
    if (filters.lsc) query = query.eq('lsc', filters.lsc);
    if (filters.division) query = query.eq('division', filters.division);
    if (filters.state) query = query.eq('state', filters.state);
    if (filters.country) query = query.eq('country', filters.country);

    const teams = ensureRows<TeamRow>(
      await query.order('name', { ascending: true }).range(filters.offset, filters.offset + filters.limit - 1),
      'Failed to load teams',
    );

    res.json(teams);
  } catch (error) {
    next(error);
  }
});

router.get('/:teamId', async (req, res, next) => {
  try {
    const team = await requireTeam(idParam.parse(req.params.teamId));
    res.json(team);
  } catch (error) {
    next(error);
  }
});

router.post('/', adminOnly, async (req, res, next) => {
  try {
    const payload = teamBodySchema.parse(req.body ?? {});
    const record = {
      name: payload.name,
      team_type: payload.team_type,
      sanctioning_body: payload.sanctioning_body,
      lsc: payload.lsc ?? null,
      division: payload.division ?? null,
      state: payload.state ?? null,
      country: payload.country ?? null,
    };
    validateTeamFields(record);

    const insert = await supabase.from('teams').insert(record).select(TEAM_COLUMNS).maybeSingle();
    if (isUniqueViolation(insert.error)) {
      throw duplicateName(payload.name);
    }
    const team = handleSupabaseSingle<TeamRow>(insert, 'Failed to create team');

    logger.info('team_created', { teamId: team.id, name: team.name, teamType: team.team_type });
    res.status(201).json(team);
  } catch (error) {
    next(error);
  }
});

router.patch('/:teamId', adminOnly, async (req, res, next) => {
  try {
    const teamId = idParam.parse(req.params.teamId);
    const existing = await requireTeam(teamId);
    const updates = updateTeamSchema.parse(req.body ?? {});

    if (Object.keys(updates).length === 0) {
      res.json(existing);
      return;
    }

    validateTeamFields({
      team_type: updates.team_type ?? existing.team_type,
      lsc: updates.lsc !== undefined ? updates.lsc : existing.lsc,
      division: updates.division !== undefined ? updates.division : existing.division,
      state: updates.state !== undefined ? updates.state : existing.state,
      country: updates.country !== undefined ? updates.country : existing.country,
    });

    const update = await supabase.from('teams').update(updates).eq('id', teamId).select(TEAM_COLUMNS).maybeSingle();
    if (isUniqueViolation(update.error)) {
      throw duplicateName(updates.name ?? existing.name);
    }
    const team = handleSupabaseSingle<TeamRow>(update, 'Failed to update team');

    logger.info('team_updated', { teamId, fields: Object.keys(updates) });
    res.json(team);
  } catch (error) {
    next(error);
  }
});

router.delete('/:teamId', adminOnly, async (req, res, next) => {
  try {
    const teamId = idParam.parse(req.params.teamId);
    const existing = await requireTeam(teamId);

    const removal = await supabase.from('teams').delete().eq('id', teamId);
    if (isForeignKeyViolation(removal.error)) {
      throw new HttpError(409, `Team '${existing.name}' has recorded swim times and cannot be deleted`);
    }
    ensureOk(removal, 'Failed to delete team');

    logger.info('team_deleted', { teamId, name: existing.name });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
