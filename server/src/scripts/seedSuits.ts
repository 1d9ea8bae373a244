import { loadSuitCatalog, upsertSuitCatalog } from '../repositories/suitCatalog.js';
import { logger } from '../logger.js';

async function main() {
  const catalog = await loadSuitCatalog();
  const models = await upsertSuitCatalog(catalog);
  logger.info('suit_catalog_seeded', { entries: catalog.length, stored: models.length });
}

main().catch((error: unknown) => {
  logger.error('suit_catalog_seed_failed', { error });
  process.exitCode = 1;
});
