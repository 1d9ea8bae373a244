import { ValidationError } from '../utils/errors.js';
import type { Course, Stroke } from '../types.js';

export interface EventKey {
  stroke: Stroke;
  distance: number;
  course: Course;
}

export const VALID_DISTANCES = [25, 50, 100, 200, 400, 500, 800, 1000, 1500, 1650] as const;

const YARDS_TO_METERS: ReadonlyMap<number, number> = new Map([
  [500, 400],
  [1000, 800],
  [1650, 1500],
]);

const METERS_TO_YARDS: ReadonlyMap<number, number> = new Map(
  Array.from(YARDS_TO_METERS, ([yards, meters]) => [meters, yards] as const),
);

const STROKE_SHORT_NAMES: Record<Stroke, string> = {
  freestyle: 'Free',
  backstroke: 'Back',
  breaststroke: 'Breast',
  butterfly: 'Fly',
  im: 'IM',
};

export const STROKE_ALIASES: ReadonlyMap<string, Stroke> = new Map<string, Stroke>([
  ['free', 'freestyle'],
  ['freestyle', 'freestyle'],
  ['fr', 'freestyle'],
  ['back', 'backstroke'],
  ['backstroke', 'backstroke'],
  ['bk', 'backstroke'],
  ['breast', 'breaststroke'],
  ['breaststroke', 'breaststroke'],
  ['br', 'breaststroke'],
  ['fly', 'butterfly'],
  ['butterfly', 'butterfly'],
  ['fl', 'butterfly'],
  ['im', 'im'],
  ['medley', 'im'],
]);

export const COURSE_ALIASES: ReadonlyMap<string, Course> = new Map<string, Course>([
  ['scy', 'scy'],
  ['yards', 'scy'],
  ['y', 'scy'],
  ['scm', 'scm'],
  ['lcm', 'lcm'],
  ['meters', 'lcm'],
  ['m', 'lcm'],
]);

export class EventValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'EventValidationError';
  }
}

function isValidDistance(distance: number) {
  return VALID_DISTANCES.some((valid) => valid === distance);
}

function isMetersCourse(course: Course) {
  return course === 'scm' || course === 'lcm';
}

/**
 * Yards-only and meters-only distances exist for freestyle only; IM and the
 * other strokes share distances across every course.
 */
export function validateEvent(event: EventKey): EventKey {
  if (!isValidDistance(event.distance)) {
    throw new EventValidationError(
      `Invalid distance: ${event.distance}. Valid distances: ${VALID_DISTANCES.join(', ')}`,
    );
  }

  if (event.stroke !== 'freestyle') {
    return event;
  }

  const yardsEquivalent = METERS_TO_YARDS.get(event.distance);
  if (event.course === 'scy' && yardsEquivalent !== undefined) {
    throw new EventValidationError(
      `${event.distance} is a meters distance, not valid for SCY freestyle. SCY equivalent: ${yardsEquivalent}`,
    );
  }

  const metersEquivalent = YARDS_TO_METERS.get(event.distance);
  if (isMetersCourse(event.course) && metersEquivalent !== undefined) {
    throw new EventValidationError(
      `${event.distance} is a yards distance, not valid for ${event.course.toUpperCase()} freestyle. ` +
        `Meters equivalent: ${metersEquivalent}`,
    );
  }

  return event;
}

export function equivalentEvent(event: EventKey, targetCourse: Course): EventKey {
  if (event.course === targetCourse) {
    return event;
  }

  if (event.course === 'scy' && isMetersCourse(targetCourse)) {
    return { stroke: event.stroke, distance: YARDS_TO_METERS.get(event.distance) ?? event.distance, course: targetCourse };
  }

  if (isMetersCourse(event.course) && targetCourse === 'scy') {
    return { stroke: event.stroke, distance: METERS_TO_YARDS.get(event.distance) ?? event.distance, course: targetCourse };
  }

  return { stroke: event.stroke, distance: event.distance, course: targetCourse };
}

export function equivalentEvents(event: EventKey): EventKey[] {
  const courses: Course[] = ['scy', 'scm', 'lcm'];
  return courses.filter((course) => course !== event.course).map((course) => equivalentEvent(event, course));
}

/** Groups an event with its counterparts in other courses, e.g. 500 SCY and 400 LCM free. */
export function equivalenceKey(event: EventKey): string {
  const distance = event.course === 'scy' ? YARDS_TO_METERS.get(event.distance) ?? event.distance : event.distance;
  return `${event.stroke}-${distance}`;
}

export function eventShortName(event: Pick<EventKey, 'stroke' | 'distance'>) {
  return `${event.distance} ${STROKE_SHORT_NAMES[event.stroke]}`;
}

export function eventLabel(event: EventKey) {
  return `${eventShortName(event)} ${event.course.toUpperCase()}`;
}

export function parseEventDescription(description: string, defaultCourse?: Course): EventKey {
  const parts = description.toLowerCase().trim().split(/\s+/).filter(Boolean);
  if (parts.length < 2 || parts.length > 3) {
    throw new EventValidationError(
      `Invalid event format: '${description}'. Expected '<distance> <stroke> <course>', e.g. '100 free scy'`,
    );
  }

  const [distancePart = '', strokePart = '', coursePart] = parts;
  if (!/^\d+$/.test(distancePart)) {
    throw new EventValidationError(`Invalid distance: '${distancePart}'`);
  }
  const distance = Number.parseInt(distancePart, 10);

  const stroke = STROKE_ALIASES.get(strokePart);
  if (!stroke) {
    throw new EventValidationError(
      `Invalid stroke: '${strokePart}'. Valid strokes: ${Array.from(STROKE_ALIASES.keys()).join(', ')}`,
    );
  }

  let course: Course | undefined = defaultCourse;
  if (coursePart !== undefined) {
    course = COURSE_ALIASES.get(coursePart);
    if (!course) {
      throw new EventValidationError(`Invalid course: '${coursePart}'. Valid courses: scy, scm, lcm`);
    }
  }
  if (!course) {
    throw new EventValidationError(`No course specified in '${description}'`);
  }

  return validateEvent({ distance, stroke, course });
}
