import type { PostgrestError, PostgrestSingleResponse } from '@supabase/supabase-js';
import { HttpError } from './errors.js';

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

export function handleSupabaseMaybe<T>(
  response: PostgrestSingleResponse<T | null>,
  failureMessage: string,
): T | null {
  if (response.error) {
    throw new HttpError(500, failureMessage, response.error);
  }
  return response.data;
}

export function handleSupabaseSingle<T>(
  response: PostgrestSingleResponse<T | null>,
  failureMessage: string,
): T {
  const data = handleSupabaseMaybe(response, failureMessage);
  if (!data) {
    throw new HttpError(500, failureMessage);
  }
  return data;
}

export function ensureRows<T>(response: { data: T[] | null; error: PostgrestError | null }, message: string): T[] {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
  return response.data ?? [];
}

export function ensureOk(response: { error: PostgrestError | null }, message: string) {
  if (response.error) {
    throw new HttpError(500, message, response.error);
  }
}

export function isUniqueViolation(error: PostgrestError | null): boolean {
  return error?.code === UNIQUE_VIOLATION;
}

export function isForeignKeyViolation(error: PostgrestError | null): boolean {
  return error?.code === FOREIGN_KEY_VIOLATION;
}

// PostgREST `or` filters treat commas and parentheses as syntax.
export function escapeFilterValue(value: string) {
  return value.replace(/[,()]/g, ' ').trim();
}

/** Makes `%` and `_` match themselves in an `ilike` pattern. */
export function escapeLikePattern(value: string) {
  return value.replace(/[\\%_]/g, '\\$&');
}
