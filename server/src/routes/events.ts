import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { parseEventDescription } from '../domain/events.js';
import { findEquivalentEvents, findEvent, toEventResponse } from '../repositories/events.js';
import { requireEvent } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import { ensureRows } from '../utils/supabase.js';
import { idParam } from '../utils/query.js';
import { COURSES, STROKES, type EventRow } from '../types.js';

const listEventsSchema = z.object({
  stroke: z.enum(STROKES).optional(),
  distance: z.coerce.number().int().positive().optional(),
  course: z.enum(COURSES).optional(),
});

const router = Router();

router.use(authenticate);

router.get('/', async (req, res, next) => {
  try {
    const filters = listEventsSchema.parse(req.query);

    let query = supabase.from('events').select('id, stroke, distance, course');
    if (filters.stroke) query = query.eq('stroke', filters.stroke);
    if (filters.distance !== undefined) query = query.eq('distance', filters.distance);
    if (filters.course) query = query.eq('course', filters.course);

    const events = ensureRows<EventRow>(
      await query
        .order('course', { ascending: true })
        .order('stroke', { ascending: true })
        .order('distance', { ascending: true }),
      'Failed to load events',
    );

    res.json(events.map(toEventResponse));
  } catch (error) {
    next(error);
  }
});

router.get('/lookup/:description', async (req, res, next) => {
  try {
    const key = parseEventDescription(z.string().min(1).parse(req.params.description));
    const event = await findEvent(key);
    if (!event) {
      throw new HttpError(404, `Event not found: ${key.distance} ${key.stroke} ${key.course}`);
    }
    res.json(toEventResponse(event));
  } catch (error) {
    next(error);
  }
});

router.get('/:eventId', async (req, res, next) => {
  try {
    const event = await requireEvent(idParam.parse(req.params.eventId));
    res.json(toEventResponse(event));
  } catch (error) {
    next(error);
  }
});

router.get('/:eventId/equivalents', async (req, res, next) => {
  try {
    const event = await requireEvent(idParam.parse(req.params.eventId));
    const equivalents = await findEquivalentEvents(event);
    res.json({ event: toEventResponse(event), equivalents: equivalents.map(toEventResponse) });
  } catch (error) {
    next(error);
  }
});

export default router;
