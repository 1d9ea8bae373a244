import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { ensureRows } from '../utils/supabase.js';
import { GENDERS, SUIT_TYPES, type SuitModelRow } from '../types.js';

const CATALOG_URL = new URL('../../data/suit-models.json', import.meta.url);

const catalogEntrySchema = z.object({
  brand: z.string().min(1),
  model_name: z.string().min(1),
  suit_type: z.enum(SUIT_TYPES),
  is_tech_suit: z.boolean(),
  gender: z.enum(GENDERS),
  release_year: z.number().int().nullable().default(null),
  msrp_cents: z.number().int().min(0).nullable().default(null),
  expected_races_peak: z.number().int().positive().default(10),
  expected_races_total: z.number().int().positive().default(30),
  fina_approved: z.boolean().default(true),
  notes: z.string().nullable().default(null),
});

export type SuitCatalogEntry = z.infer<typeof catalogEntrySchema>;

export async function loadSuitCatalog(url: URL = CATALOG_URL): Promise<SuitCatalogEntry[]> {
  const raw: unknown = JSON.parse(await readFile(url, 'utf8'));
  return z.array(catalogEntrySchema).parse(raw);
}

/** Inserts new catalog entries and refreshes existing ones, keyed on brand, model, type and gender. */
export async function upsertSuitCatalog(entries: readonly SuitCatalogEntry[]) {
  if (entries.length === 0) {
    return [];
  }
  return ensureRows<SuitModelRow>(
    await supabase
      .from('suit_models')
      .upsert([...entries], { onConflict: 'brand,model_name,suit_type,gender' })
      .select('*'),
    'Failed to seed suit models',
  );
}
