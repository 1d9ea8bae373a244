import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOrCoach } from '../middleware/requireRole.js';
import { normalizeSplits, validateSplits, withIntervals, type Split } from '../domain/splits.js';
import {
  analyzeAgainstPersonalBest,
  personalBests,
  splitMeetsStandard,
  toSwimTimeResponse,
} from '../domain/swimTimes.js';
import { applicableStandards, evaluateTime, type StandardCriteria } from '../domain/qualification.js';
import { ageOnDate } from '../domain/swimmers.js';
import { formatTime, requireCentiseconds } from '../domain/time.js';
import { toEventResponse } from '../repositories/events.js';
import {
  requireEvent,
  requireMeet,
  requireSwimmer,
  requireSwimmerSuit,
  requireSwimTime,
  requireTeam,
} from '../repositories/lookups.js';
import { ensureOk, ensureRows, handleSupabaseSingle } from '../utils/supabase.js';
import { booleanQuery, idParam, isoDate, limitQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import { ROUNDS, type EventRow, type SplitRow, type SwimTimeRow, type TimeStandardRow } from '../types.js';

const splitsSchema = z.union([
  z.string(),
  z.array(
    z.object({
      distance: z.number().int().positive(),
      time_centiseconds: z.number().int().min(0).optional(),
      time_formatted: z.string().min(1).optional(),
    }),
  ),
]);

const swimTimeFieldsSchema = z.object({
  time_centiseconds: z.number().int().min(0).optional(),
  time_formatted: z.string().min(1).optional(),
  swim_date: isoDate,
  round: z.enum(ROUNDS).nullable().optional(),
  lane: z.number().int().min(1, 'Lane must be between 1 and 10').max(10, 'Lane must be between 1 and 10').nullable().optional(),
  place: z.number().int().min(1).nullable().optional(),
  official: z.boolean().optional(),
  dq: z.boolean().optional(),
  dq_reason: z.string().trim().max(500).nullable().optional(),
  suit_id: z.string().min(1).nullable().optional(),
  splits: splitsSchema.optional(),
});

const createSwimTimeSchema = swimTimeFieldsSchema.extend({
  swimmer_id: idParam,
  event_id: idParam,
  meet_id: idParam,
  team_id: idParam,
});

const updateSwimTimeSchema = swimTimeFieldsSchema.partial();

const listSwimTimesSchema = z.object({
  swimmer_id: z.string().optional(),
  event_id: z.string().optional(),
  meet_id: z.string().optional(),
  team_id: z.string().optional(),
  round: z.enum(ROUNDS).optional(),
  official_only: booleanQuery(true),
  exclude_dq: booleanQuery(true),
  start_date: isoDate.optional(),
  end_date: isoDate.optional(),
  limit: limitQuery,
});

const standardsQuerySchema = z.object({
  sanctioning_body: z.string().optional(),
  standard_name: z.string().optional(),
});

async function loadSplits(swimTimeId: string) {
  return ensureRows<SplitRow>(
    await supabase
      .from('splits')
      .select('id, swim_time_id, distance, time_centiseconds')
      .eq('swim_time_id', swimTimeId)
      .order('distance', { ascending: true }),
    'Failed to load splits',
  );
}

async function insertSplits(swimTimeId: string, splits: readonly Split[]) {
  if (splits.length === 0) {
    return;
  }
  ensureOk(
    await supabase.from('splits').insert(
      splits.map((split) => ({
        swim_time_id: swimTimeId,
        distance: split.distance,
        time_centiseconds: split.time_centiseconds,
      })),
    ),
    'Failed to save splits',
  );
}

async function replaceSplits(swimTimeId: string, splits: readonly Split[]) {
  ensureOk(await supabase.from('splits').delete().eq('swim_time_id', swimTimeId), 'Failed to replace splits');
  await insertSplits(swimTimeId, splits);
}

/**
 * Checks each split against the cuts of the same-stroke event at that
 * distance, such as the 50 split of a 100 free against 50 free cuts.
 */
async function evaluateSplits(swim: SwimTimeRow, event: EventRow, criteria: Omit<StandardCriteria, 'eventId'>) {
  const splits = await loadSplits(swim.id);
  if (splits.length === 0 || event.stroke === 'im') {
    return [];
  }

  const splitEvents = ensureRows<EventRow>(
    await supabase
      .from('events')
      .select('*')
      .eq('stroke', event.stroke)
      .eq('course', event.course)
      .in('distance', splits.map((split) => split.distance)),
    'Failed to load events',
  );
  if (splitEvents.length === 0) {
    return [];
  }

  const candidates = ensureRows<TimeStandardRow>(
    await supabase
      .from('time_standards')
      .select('*')
      .in('event_id', splitEvents.map((splitEvent) => splitEvent.id))
      .eq('gender', criteria.gender),
    'Failed to load time standards',
  );

  return splits.flatMap((split) => {
    const splitEvent = splitEvents.find((candidate) => candidate.distance === split.distance);
    if (!splitEvent) {
      return [];
    }
    const achieved = applicableStandards(candidates, { ...criteria, eventId: splitEvent.id })
      .filter((standard) => splitMeetsStandard(swim, split.time_centiseconds, standard.time_centiseconds))
      .sort((a, b) => a.time_centiseconds - b.time_centiseconds);
    return [
      {
        distance: split.distance,
        time_centiseconds: split.time_centiseconds,
        time_formatted: formatTime(split.time_centiseconds),
        event: toEventResponse(splitEvent),
        achieved: achieved.map((standard) => ({ standard, time_formatted: formatTime(standard.time_centiseconds) })),
      },
    ];
  });
}

async function toDetailedResponse(swim: SwimTimeRow) {
  const splits = await loadSplits(swim.id);
  return { ...toSwimTimeResponse(swim), splits: withIntervals(splits) };
}

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listSwimTimesSchema.parse(req.query);

    let query = supabase.from('swim_times').select('*');
    if (filters.swimmer_id) query = query.eq('swimmer_id', filters.swimmer_id);
    if (filters.event_id) query = query.eq('event_id', filters.event_id);
    if (filters.meet_id) query = query.eq('meet_id', filters.meet_id);
    if (filters.team_id) query = query.eq('team_id', filters.team_id);
    if (filters.round) query = query.eq('round', filters.round);
    if (filters.official_only) query = query.eq('official', true);
    if (filters.exclude_dq) query = query.eq('dq', false);
    if (filters.start_date) query = query.gte('swim_date', filters.start_date);
    if (filters.end_date) query = query.lte('swim_date', filters.end_date);

    const swims = ensureRows<SwimTimeRow>(
      await query.order('time_centiseconds', { ascending: true }).limit(filters.limit),
      'Failed to load swim times',
    );

    res.json(swims.map((swim) => toSwimTimeResponse(swim)));
  } catch (error) {
    next(error);
  }
});

router.get('/analysis/:swimTimeId', async (req, res, next) => {
  try {
    const swim = await requireSwimTime(idParam.parse(req.params.swimTimeId));
    const history = ensureRows<SwimTimeRow>(
      await supabase.from('swim_times').select('*').eq('swimmer_id', swim.swimmer_id).eq('event_id', swim.event_id),
      'Failed to load swim history',
    );
    const [best = null] = personalBests(history);
    const analysis = analyzeAgainstPersonalBest(swim, best);

    res.json({
      swim_time: toSwimTimeResponse(swim),
      ...analysis,
      personal_best: analysis.personal_best ? toSwimTimeResponse(analysis.personal_best) : null,
    });
  } catch (error) {
    next(error);
  }
});

router.get('/:swimTimeId', async (req, res, next) => {
  try {
    const swim = await requireSwimTime(idParam.parse(req.params.swimTimeId));
    res.json(await toDetailedResponse(swim));
  } catch (error) {
    next(error);
  }
});

router.get('/:swimTimeId/standards', async (req, res, next) => {
  try {
    const swim = await requireSwimTime(idParam.parse(req.params.swimTimeId));
    const filters = standardsQuerySchema.parse(req.query);
    const swimmer = await requireSwimmer(swim.swimmer_id);
    const event = await requireEvent(swim.event_id);
    const age = ageOnDate(swimmer.date_of_birth, swim.swim_date);

    const candidates = ensureRows<TimeStandardRow>(
      await supabase.from('time_standards').select('*').eq('event_id', swim.event_id).eq('gender', swimmer.gender),
      'Failed to load time standards',
    );
    const criteria = {
      gender: swimmer.gender,
      age,
      swimDate: swim.swim_date,
      sanctioningBody: filters.sanctioning_body,
      standardName: filters.standard_name,
    };
    const standards = applicableStandards(candidates, { ...criteria, eventId: swim.event_id });

    res.json({
      swim_time: toSwimTimeResponse(swim),
      event: toEventResponse(event),
      age,
      ...evaluateTime(swim.time_centiseconds, standards, swim),
      split_standards: await evaluateSplits(swim, event, criteria),
    });
  } catch (error) {
    next(error);
  }
});

router.post('/', adminOrCoach, async (req, res, next) => {
  try {
    const payload = createSwimTimeSchema.parse(req.body ?? {});
    const time = requireCentiseconds(payload);

    await requireSwimmer(payload.swimmer_id);
    const event = await requireEvent(payload.event_id);
    await requireMeet(payload.meet_id);
    await requireTeam(payload.team_id);
    if (payload.suit_id) {
      await requireSwimmerSuit(payload.suit_id);
    }

    const splits = payload.splits === undefined ? [] : normalizeSplits(payload.splits);
    validateSplits(splits, event.distance, time);

    const swim = handleSupabaseSingle<SwimTimeRow>(
      await supabase
        .from('swim_times')
        .insert({
          swimmer_id: payload.swimmer_id,
          event_id: payload.event_id,
          meet_id: payload.meet_id,
          team_id: payload.team_id,
          time_centiseconds: time,
          swim_date: payload.swim_date,
          round: payload.round ?? null,
          lane: payload.lane ?? null,
          place: payload.place ?? null,
          official: payload.official ?? true,
          dq: payload.dq ?? false,
          dq_reason: payload.dq_reason ?? null,
          suit_id: payload.suit_id ?? null,
        })
        .select('*')
        .maybeSingle(),
      'Failed to record swim time',
    );

    try {
      await insertSplits(swim.id, splits);
    } catch (error) {
      // A swim is never left stored without the splits it was recorded with.
      const rollback = await supabase.from('swim_times').delete().eq('id', swim.id);
      if (rollback.error) {
        logger.error('swim_time_rollback_failed', { swimTimeId: swim.id, error: rollback.error.message });
      }
      throw error;
    }

    logger.info('swim_time_recorded', {
      swimTimeId: swim.id,
      swimmerId: swim.swimmer_id,
      eventId: swim.event_id,
      timeCentiseconds: swim.time_centiseconds,
      splits: splits.length,
    });
    res.status(201).json(await toDetailedResponse(swim));
  } catch (error) {
    next(error);
  }
});

router.patch('/:swimTimeId', adminOrCoach, async (req, res, next) => {
  try {
    const swimTimeId = idParam.parse(req.params.swimTimeId);
    const existing = await requireSwimTime(swimTimeId);
    const { splits: splitsInput, time_centiseconds, time_formatted, ...fields } = updateSwimTimeSchema.parse(
      req.body ?? {},
    );

    if (fields.suit_id) {
      await requireSwimmerSuit(fields.suit_id);
    }

    const timeChanged = time_centiseconds !== undefined || time_formatted !== undefined;
    const time = timeChanged ? requireCentiseconds({ time_centiseconds, time_formatted }) : existing.time_centiseconds;

    let splits: Split[] | undefined;
    if (splitsInput !== undefined || timeChanged) {
      const event = await requireEvent(existing.event_id);
      splits = splitsInput !== undefined ? normalizeSplits(splitsInput) : await loadSplits(swimTimeId);
      validateSplits(splits, event.distance, time);
    }

    const updates = timeChanged ? { ...fields, time_centiseconds: time } : fields;
    let swim = existing;
    if (Object.keys(updates).length > 0) {
      swim = handleSupabaseSingle<SwimTimeRow>(
        await supabase.from('swim_times').update(updates).eq('id', swimTimeId).select('*').maybeSingle(),
        'Failed to update swim time',
      );
    }
    if (splitsInput !== undefined && splits) {
      await replaceSplits(swimTimeId, splits);
    }

    logger.info('swim_time_updated', {
      swimTimeId,
      fields: Object.keys(updates),
      splitsReplaced: splitsInput !== undefined,
    });
    res.json(await toDetailedResponse(swim));
  } catch (error) {
    next(error);
  }
});

router.delete('/:swimTimeId', adminOrCoach, async (req, res, next) => {
  try {
    const swimTimeId = idParam.parse(req.params.swimTimeId);
    const existing = await requireSwimTime(swimTimeId);

    ensureOk(await supabase.from('splits').delete().eq('swim_time_id', swimTimeId), 'Failed to delete splits');
    ensureOk(await supabase.from('swim_times').delete().eq('id', swimTimeId), 'Failed to delete swim time');

    logger.info('swim_time_deleted', { swimTimeId, swimmerId: existing.swimmer_id });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
