import { z } from 'zod';
import { supabase } from '../supabase.js';
import {
  equivalentEvents,
  eventLabel,
  parseEventDescription,
  validateEvent,
  type EventKey,
} from '../domain/events.js';
import { HttpError } from '../utils/errors.js';
import { ensureRows, handleSupabaseMaybe, isUniqueViolation } from '../utils/supabase.js';
import { requireEvent } from './lookups.js';
import { COURSES, STROKES, type EventRow } from '../types.js';

export function toEventResponse(event: EventRow) {
  return { ...event, label: eventLabel(event) };
}

export async function findEvent(key: EventKey) {
  return handleSupabaseMaybe<EventRow>(
    await supabase
      .from('events')
      .select('id, stroke, distance, course')
      .eq('stroke', key.stroke)
      .eq('distance', key.distance)
      .eq('course', key.course)
      .maybeSingle(),
    'Failed to look up event',
  );
}

export async function findOrCreateEvent(key: EventKey): Promise<EventRow> {
  validateEvent(key);
  const existing = await findEvent(key);
  if (existing) {
    return existing;
  }

  const insert = await supabase
    .from('events')
    .insert({ stroke: key.stroke, distance: key.distance, course: key.course })
    .select('id, stroke, distance, course')
    .maybeSingle();

  // Lost a race with a concurrent insert of the same event.
  if (isUniqueViolation(insert.error)) {
    const raced = await findEvent(key);
    if (raced) {
      return raced;
    }
  }

  const created = handleSupabaseMaybe<EventRow>(insert, 'Failed to create event');
  if (!created) {
    throw new HttpError(500, 'Failed to create event');
  }
  return created;
}

export async function loadEventsById(ids: readonly string[]) {
  if (ids.length === 0) {
    return new Map<string, EventRow>();
  }
  const events = ensureRows<EventRow>(
    await supabase.from('events').select('id, stroke, distance, course').in('id', Array.from(new Set(ids))),
    'Failed to load events',
  );
  return new Map(events.map((event) => [event.id, event]));
}

/** Stored counterparts of an event in the other two courses. */
export async function findEquivalentEvents(event: EventKey) {
  const found = await Promise.all(equivalentEvents(event).map((key) => findEvent(key)));
  return found.filter((row): row is EventRow => row !== null);
}

export const eventReferenceSchema = z.object({
  event_id: z.string().min(1).optional(),
  event: z.string().min(1).optional(),
  stroke: z.enum(STROKES).optional(),
  distance: z.coerce.number().int().positive().optional(),
  course: z.enum(COURSES).optional(),
});

export type EventReference = z.infer<typeof eventReferenceSchema>;

/**
 * Resolves an event given by id, by description (`100 free scy`) or by its
 * parts. With `create`, a valid event missing from the table is inserted.
 */
export async function resolveEventReference(reference: EventReference, options: { create: boolean }) {
  if (reference.event_id) {
    return requireEvent(reference.event_id);
  }

  let key: EventKey;
  if (reference.event) {
    key = parseEventDescription(reference.event, reference.course);
  } else if (reference.stroke && reference.distance !== undefined && reference.course) {
    key = validateEvent({ stroke: reference.stroke, distance: reference.distance, course: reference.course });
  } else {
    throw new HttpError(400, 'An event is required: event_id, event, or stroke, distance and course');
  }

  if (options.create) {
    return findOrCreateEvent(key);
  }
  const event = await findEvent(key);
  if (!event) {
    throw new HttpError(404, `Event not found: ${key.distance} ${key.stroke} ${key.course}`);
  }
  return event;
}
