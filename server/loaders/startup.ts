import type { OfficeConfig } from '../core/config';
import { logger } from '../core/logger';
import { createOfficeStore } from '../core/store';
import type { OfficeStore } from '../core/store/types';
import { getErrorMessage } from '../utils/errorUtils';

async function retryWithBackoff<T>(fn: () => Promise<T>, label: string, maxRetries = 3): Promise<T> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt === maxRetries) throw err;
      const delay = Math.pow(2, attempt) * 1000;
      logger.info(`[Startup] ${label} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay/1000}s...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
  throw new Error('unreachable');
}

export interface StartupHealth {
  store: 'ok' | 'failed' | 'pending';
  storeDriver: OfficeConfig['storeDriver'];
  criticalFailures: string[];
  startedAt: string;
  completedAt?: string;
}

const startupHealth: StartupHealth = {
  store: 'pending',
  storeDriver: 'postgres',
  criticalFailures: [],
  startedAt: new Date().toISOString()
};

export function getStartupHealth(): StartupHealth {
  return { ...startupHealth, criticalFailures: [...startupHealth.criticalFailures] };
}

/**
 * Opens the configured store, creating the schema when it is Postgres.
 * Failures are recorded in the startup health before they propagate.
 */
export async function initializeStore(cfg: OfficeConfig): Promise<OfficeStore> {
  startupHealth.storeDriver = cfg.storeDriver;
  try {
    const store = await retryWithBackoff(() => createOfficeStore(cfg), 'Store initialization');
    startupHealth.store = 'ok';
    logger.info(`[Startup] Store ready (${cfg.storeDriver})`);
    return store;
  } catch (err: unknown) {
    startupHealth.store = 'failed';
    startupHealth.criticalFailures.push(`Store initialization: ${getErrorMessage(err)}`);
    logger.error('[Startup] Store initialization failed', { error: err instanceof Error ? err : new Error(String(err)) });
    throw err;
  } finally {
    startupHealth.completedAt = new Date().toISOString();
  }
}
