import { supabase } from '../supabase.js';
import { HttpError } from '../utils/errors.js';
import { ensureRows, handleSupabaseMaybe } from '../utils/supabase.js';
import type {
  EventRow,
  MeetRow,
  SuitModelRow,
  SwimmerRow,
  SwimmerSuitRow,
  SwimTimeRow,
  TeamRow,
  UserRow,
} from '../types.js';

type LookupTable = 'swimmers' | 'teams' | 'meets' | 'events' | 'swim_times' | 'suit_models' | 'swimmer_suits';

async function findById<T>(table: LookupTable, id: string, label: string): Promise<T | null> {
  return handleSupabaseMaybe<T>(
    await supabase.from(table).select('*').eq('id', id).maybeSingle(),
    `Failed to load ${label}`,
  );
}

async function requireById<T>(table: LookupTable, id: string, label: string, notFound: string): Promise<T> {
  const row = await findById<T>(table, id, label);
  if (!row) {
    throw new HttpError(404, notFound);
  }
  return row;
}

export const requireSwimmer = (id: string) => requireById<SwimmerRow>('swimmers', id, 'swimmer', 'Swimmer not found');
export const requireTeam = (id: string) => requireById<TeamRow>('teams', id, 'team', 'Team not found');
export const requireMeet = (id: string) => requireById<MeetRow>('meets', id, 'meet', 'Meet not found');
export const requireEvent = (id: string) => requireById<EventRow>('events', id, 'event', 'Event not found');
export const requireSwimTime = (id: string) =>
  requireById<SwimTimeRow>('swim_times', id, 'swim time', 'Swim time not found');
export const requireSuitModel = (id: string) =>
  requireById<SuitModelRow>('suit_models', id, 'suit model', 'Suit model not found');
export const requireSwimmerSuit = (id: string) =>
  requireById<SwimmerSuitRow>('swimmer_suits', id, 'suit', 'Suit not found');

export const findSuitModel = (id: string) => findById<SuitModelRow>('suit_models', id, 'suit model');

export async function findUser(id: string) {
  return handleSupabaseMaybe<UserRow>(
    await supabase
      .from('users')
      .select('id, email, password_hash, display_name, role, swimmer_id, active, created_at')
      .eq('id', id)
      .maybeSingle(),
    'Failed to load user',
  );
}

export async function loadTeamNames(teamIds: readonly string[]) {
  if (teamIds.length === 0) {
    return new Map<string, string>();
  }
  const teams = ensureRows<Pick<TeamRow, 'id' | 'name'>>(
    await supabase.from('teams').select('id, name').in('id', Array.from(new Set(teamIds))),
    'Failed to load teams',
  );
  return new Map(teams.map((team) => [team.id, team.name]));
}
