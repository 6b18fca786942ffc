import type { OfficeConfig } from '../config';
import { logger } from '../logger';
import { MemoryOfficeStore } from './memoryStore';
import { seedMemoryStore } from './demoData';
import type { OfficeStore } from './types';

export type { OfficeRepository, OfficeStore } from './types';
export { MemoryOfficeStore } from './memoryStore';

/**
 * Builds the store named by `storeDriver`. The Postgres pieces load lazily so a
 * memory-backed process never opens a pool.
 */
export async function createOfficeStore(cfg: OfficeConfig): Promise<OfficeStore> {
  if (cfg.storeDriver === 'memory') {
    const store = new MemoryOfficeStore();
    await seedMemoryStore(store);
    logger.info('[Store] Using in-memory store with demo data');
    return store;
  }

  const { ensureOfficeSchema } = await import('../../db-init');
  const { db } = await import('../../db');
  const { DrizzleOfficeStore } = await import('./drizzleStore');
  await ensureOfficeSchema();
  logger.info('[Store] Using Postgres store');
  return new DrizzleOfficeStore(db, { transactionTimeoutMs: cfg.transactionTimeoutMs });
}
