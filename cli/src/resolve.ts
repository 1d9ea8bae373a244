import { z } from 'zod';
import { ApiError, type ApiClient } from './client.js';
import { UsageError } from './args.js';
import { eventSchema, meetSchema, swimmerSchema, teamSchema } from './schemas.js';

interface Named {
  id: string;
}

/**
 * Accepts an id or a name. The id is tried first; a name must match one
 * record exactly (case-insensitive), or be the only partial match.
 */
async function resolveByIdOrName<T extends Named>(
  client: ApiClient,
  options: {
    kind: string;
    path: string;
    schema: z.ZodType<T>;
    reference: string;
    nameOf: (record: T) => string;
    aliasesOf?: (record: T) => string[];
  },
): Promise<T> {
  try {
    return await client.get(`${options.path}/${encodeURIComponent(options.reference)}`, options.schema);
  } catch (error) {
    if (!(error instanceof ApiError) || error.status !== 404) {
      throw error;
    }
  }

  const candidates = await client.get(options.path, z.array(options.schema), { name: options.reference, limit: 50 });
  const wanted = options.reference.trim().toLowerCase();
  const exact = candidates.filter((record) =>
    [options.nameOf(record), ...(options.aliasesOf?.(record) ?? [])].some((name) => name.toLowerCase() === wanted),
  );
  const matches = exact.length > 0 ? exact : candidates;

  const [only] = matches;
  if (!only) {
    throw new UsageError(`No ${options.kind} found matching '${options.reference}'`);
  }
  if (matches.length > 1) {
    const listed = matches.map((record) => `${options.nameOf(record)} (${record.id})`).join(', ');
    throw new UsageError(`Multiple ${options.kind}s match '${options.reference}': ${listed}`);
  }
  return only;
}

export function resolveSwimmer(client: ApiClient, reference: string) {
  return resolveByIdOrName(client, {
    kind: 'swimmer',
    path: '/api/v1/swimmers',
    schema: swimmerSchema,
    reference,
    nameOf: (swimmer) => swimmer.full_name,
    aliasesOf: (swimmer) => [`${swimmer.last_name}, ${swimmer.first_name}`],
  });
}

export function resolveTeam(client: ApiClient, reference: string) {
  return resolveByIdOrName(client, {
    kind: 'team',
    path: '/api/v1/teams',
    schema: teamSchema,
    reference,
    nameOf: (team) => team.name,
  });
}

export function resolveMeet(client: ApiClient, reference: string) {
  return resolveByIdOrName(client, {
    kind: 'meet',
    path: '/api/v1/meets',
    schema: meetSchema,
    reference,
    nameOf: (meet) => meet.name,
  });
}

/** `100 free scy` is looked up by description; anything without a space is an event id. */
export function resolveEvent(client: ApiClient, reference: string) {
  if (/\s/.test(reference.trim())) {
    return client.get(`/api/v1/events/lookup/${encodeURIComponent(reference.trim())}`, eventSchema);
  }
  return client.get(`/api/v1/events/${encodeURIComponent(reference)}`, eventSchema);
}
