/**
 * Picks the persistence backend: Supabase when its URL and service key are
 * configured, the local SQLite file otherwise.
 */
import { env, STORAGE } from '../config.js';
import { logger } from '../utils/logger.js';
import type { GraphPersistence } from './persistence.js';
import { SqlitePersistence } from './sqlite.js';
import { SupabasePersistence } from './supabase.js';

export function createPersistence(): GraphPersistence {
  if (env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY) {
    logger.info('Using Supabase persistence');
    return new SupabasePersistence(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY);
  }
  logger.info('Using SQLite persistence', { path: STORAGE.sqlitePath });
  return new SqlitePersistence(STORAGE.sqlitePath);
}

export { MemoryPersistence, type GraphPersistence } from './persistence.js';
export { SqlitePersistence } from './sqlite.js';
export { SupabasePersistence } from './supabase.js';
