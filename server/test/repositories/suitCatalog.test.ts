import { loadSuitCatalog, upsertSuitCatalog } from '../../src/repositories/suitCatalog.js';
import { fakeDb } from '../helpers/fakeSupabase.js';

vi.mock('../../src/supabase.js', async () => {
  const { fakeDb } = await import('../helpers/fakeSupabase.js');
  return { supabase: fakeDb.client() };
});

describe('suit catalog', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('loads the bundled catalog with one entry per model key', async () => {
    const catalog = await loadSuitCatalog();
    const keys = new Set(catalog.map((entry) => [entry.brand, entry.model_name, entry.suit_type, entry.gender].join('|')));

    expect(catalog.length).toBeGreaterThan(0);
    expect(keys.size).toBe(catalog.length);
    expect(catalog.every((entry) => entry.expected_races_peak <= entry.expected_races_total)).toBe(true);
  });

  it('upserts without duplicating existing models', async () => {
    const catalog = await loadSuitCatalog();
    const first = await upsertSuitCatalog(catalog);
    const second = await upsertSuitCatalog(catalog);

    expect(first).toHaveLength(catalog.length);
    expect(second.map((model) => model.id)).toEqual(first.map((model) => model.id));
    expect(fakeDb.rows('suit_models')).toHaveLength(catalog.length);
  });

  it('skips an empty catalog', async () => {
    expect(await upsertSuitCatalog([])).toEqual([]);
  });
});
