/**
 * Storage Factory
 *
 * Creates and initializes outcome stores from configuration.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { Logger } from '../utils/logger.js';
import type { IOutcomeStore } from './interface.js';
import { SQLiteOutcomeStore } from './sqlite/store.js';

/**
 * Storage configuration
 */
export interface StoreConfig {
  /** SQLite database path, or ":memory:" */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Log executed SQL at debug level */
  sqlLogger?: Logger;
}

/**
 * Open a store and create its schema. The parent directory of a file
 * database is created when missing.
 */
export function createOutcomeStore(config: StoreConfig): IOutcomeStore {
  if (config.dbPath !== ':memory:') {
    const dir = path.dirname(config.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const store = new SQLiteOutcomeStore(config.dbPath, {
    ...(config.walMode !== undefined && { walMode: config.walMode }),
    ...(config.sqlLogger && { logger: config.sqlLogger }),
  });
  store.initialize();
  return store;
}
