import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOnly } from '../middleware/requireRole.js';
import { applicableStandards, evaluateTime } from '../domain/qualification.js';
import { ageOnDate, todayIsoDate } from '../domain/swimmers.js';
import { equivalentEvents } from '../domain/events.js';
import { formatTime, requireCentiseconds } from '../domain/time.js';
import {
  eventReferenceSchema,
  findEvent,
  loadEventsById,
  resolveEventReference,
  toEventResponse,
} from '../repositories/events.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  escapeLikePattern,
  handleSupabaseMaybe,
  handleSupabaseSingle,
  isUniqueViolation,
} from '../utils/supabase.js';
import { booleanQuery, idParam, isoDate, limitQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import { COURSES, GENDERS, STROKES, type EventRow, type TimeStandardRow } from '../types.js';

const timeInputSchema = z.object({
  time_centiseconds: z.number().int().min(0).optional(),
  time_formatted: z.string().min(1).optional(),
});

const createStandardSchema = eventReferenceSchema.merge(timeInputSchema).extend({
  gender: z.enum(GENDERS),
  age_group: z.string().trim().min(1).max(20).nullable().optional(),
  standard_name: z.string().trim().min(1).max(100),
  cut_level: z.string().trim().min(1).max(50),
  sanctioning_body: z.string().trim().min(1).max(100),
  qualifying_start: isoDate.nullable().optional(),
  qualifying_end: isoDate.nullable().optional(),
  effective_year: z.number().int().min(1900).max(2100),
});

const listStandardsSchema = z.object({
  stroke: z.enum(STROKES).optional(),
  distance: z.coerce.number().int().positive().optional(),
  course: z.enum(COURSES).optional(),
  gender: z.enum(GENDERS).optional(),
  age_group: z.string().optional(),
  sanctioning_body: z.string().optional(),
  standard_name: z.string().optional(),
  effective_year: z.coerce.number().int().optional(),
  include_equivalents: booleanQuery(false),
  limit: limitQuery,
});

const qualifySchema = eventReferenceSchema.merge(timeInputSchema).extend({
  gender: z.enum(GENDERS),
  age: z.number().int().min(0).max(120).optional(),
  date_of_birth: isoDate.optional(),
  swim_date: isoDate.optional(),
  official: z.boolean().default(true),
  dq: z.boolean().default(false),
  sanctioning_body: z.string().optional(),
  standard_name: z.string().optional(),
});

function toStandardResponse(standard: TimeStandardRow, events: ReadonlyMap<string, EventRow>) {
  const event = events.get(standard.event_id);
  return {
    ...standard,
    time_formatted: formatTime(standard.time_centiseconds),
    event: event ? toEventResponse(event) : null,
  };
}

async function withEvents(standards: TimeStandardRow[]) {
  const events = await loadEventsById(standards.map((standard) => standard.event_id));
  return standards.map((standard) => toStandardResponse(standard, events));
}

/** Event ids matching the stroke/distance/course filters, or undefined when none are given. */
async function matchingEventIds(filters: z.infer<typeof listStandardsSchema>) {
  if (!filters.stroke && filters.distance === undefined && !filters.course) {
    return undefined;
  }

  let query = supabase.from('events').select('id, stroke, distance, course');
  if (filters.stroke) query = query.eq('stroke', filters.stroke);
  if (filters.distance !== undefined) query = query.eq('distance', filters.distance);
  if (filters.course) query = query.eq('course', filters.course);
  const events = ensureRows<EventRow>(await query, 'Failed to load events');
  const ids = events.map((event) => event.id);

  const [named] = events;
  if (filters.include_equivalents && named && filters.stroke && filters.distance !== undefined && filters.course) {
    const equivalents = await Promise.all(equivalentEvents(named).map((key) => findEvent(key)));
    for (const equivalent of equivalents) {
      if (equivalent) ids.push(equivalent.id);
    }
  }

  return ids;
}

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listStandardsSchema.parse(req.query);
    const eventIds = await matchingEventIds(filters);
    if (eventIds && eventIds.length === 0) {
      res.json([]);
      return;
    }

    let query = supabase.from('time_standards').select('*');
    if (eventIds) query = query.in('event_id', eventIds);
    if (filters.gender) query = query.eq('gender', filters.gender);
    if (filters.age_group) query = query.eq('age_group', filters.age_group);
    if (filters.sanctioning_body) query = query.ilike('sanctioning_body', escapeLikePattern(filters.sanctioning_body));
    if (filters.standard_name) query = query.ilike('standard_name', escapeLikePattern(filters.standard_name));
    if (filters.effective_year !== undefined) query = query.eq('effective_year', filters.effective_year);

    const standards = ensureRows<TimeStandardRow>(
      await query.order('time_centiseconds', { ascending: true }).limit(filters.limit),
      'Failed to load time standards',
    );

    res.json(await withEvents(standards));
  } catch (error) {
    next(error);
  }
});

router.get('/by-body/:body', async (req, res, next) => {
  try {
    const body = z.string().min(1).parse(req.params.body);
    const standards = ensureRows<TimeStandardRow>(
      await supabase
        .from('time_standards')
        .select('*')
        .ilike('sanctioning_body', escapeLikePattern(body))
        .order('standard_name', { ascending: true })
        .order('time_centiseconds', { ascending: true }),
      'Failed to load time standards',
    );

    if (standards.length === 0) {
      throw new HttpError(404, `No time standards found for '${body}'`);
    }

    res.json(await withEvents(standards));
  } catch (error) {
    next(error);
  }
});

router.post('/qualify', async (req, res, next) => {
  try {
    const payload = qualifySchema.parse(req.body ?? {});
    const time = requireCentiseconds(payload);
    const swimDate = payload.swim_date ?? todayIsoDate();

    let age = payload.age;
    if (age === undefined && payload.date_of_birth) {
      age = ageOnDate(payload.date_of_birth, swimDate);
    }
    if (age === undefined) {
      throw new HttpError(400, 'Either age or date_of_birth is required');
    }

    const event = await resolveEventReference(payload, { create: false });
    const candidates = ensureRows<TimeStandardRow>(
      await supabase.from('time_standards').select('*').eq('event_id', event.id).eq('gender', payload.gender),
      'Failed to load time standards',
    );

    const standards = applicableStandards(candidates, {
      eventId: event.id,
      gender: payload.gender,
      age,
      swimDate,
      sanctioningBody: payload.sanctioning_body,
      standardName: payload.standard_name,
    });

    res.json({
      event: toEventResponse(event),
      age,
      swim_date: swimDate,
      ...evaluateTime(time, standards, { official: payload.official, dq: payload.dq }),
    });
  } catch (error) {
    next(error);
  }
});

router.get('/:standardId', async (req, res, next) => {
  try {
    const standardId = idParam.parse(req.params.standardId);
    const standard = handleSupabaseMaybe<TimeStandardRow>(
      await supabase.from('time_standards').select('*').eq('id', standardId).maybeSingle(),
      'Failed to load time standard',
    );
    if (!standard) {
      throw new HttpError(404, 'Time standard not found');
    }
    const [response] = await withEvents([standard]);
    res.json(response);
  } catch (error) {
    next(error);
  }
});

router.post('/', adminOnly, async (req, res, next) => {
  try {
    const payload = createStandardSchema.parse(req.body ?? {});
    const time = requireCentiseconds(payload);

    if (payload.qualifying_start && payload.qualifying_end && payload.qualifying_end < payload.qualifying_start) {
      throw new HttpError(400, 'qualifying_end cannot be before qualifying_start');
    }

    const event = await resolveEventReference(payload, { create: true });

    const insert = await supabase
      .from('time_standards')
      .insert({
        event_id: event.id,
        gender: payload.gender,
        age_group: payload.age_group ?? null,
        standard_name: payload.standard_name,
        cut_level: payload.cut_level,
        sanctioning_body: payload.sanctioning_body,
        time_centiseconds: time,
        qualifying_start: payload.qualifying_start ?? null,
        qualifying_end: payload.qualifying_end ?? null,
        effective_year: payload.effective_year,
      })
      .select('*')
      .maybeSingle();

    if (isUniqueViolation(insert.error)) {
      throw new HttpError(409, 'An identical time standard already exists');
    }
    const standard = handleSupabaseSingle<TimeStandardRow>(insert, 'Failed to create time standard');

    logger.info('time_standard_created', {
      standardId: standard.id,
      eventId: event.id,
      standardName: standard.standard_name,
      cut: formatTime(time),
    });
    res.status(201).json(toStandardResponse(standard, new Map([[event.id, event]])));
  } catch (error) {
    next(error);
  }
});

router.delete('/:standardId', adminOnly, async (req, res, next) => {
  try {
    const standardId = idParam.parse(req.params.standardId);
    const existing = handleSupabaseMaybe<Pick<TimeStandardRow, 'id'>>(
      await supabase.from('time_standards').select('id').eq('id', standardId).maybeSingle(),
      'Failed to load time standard',
    );
    if (!existing) {
      throw new HttpError(404, 'Time standard not found');
    }

    ensureOk(await supabase.from('time_standards').delete().eq('id', standardId), 'Failed to delete time standard');

    logger.info('time_standard_deleted', { standardId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
