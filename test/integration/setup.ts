import { afterAll, afterEach, beforeAll } from 'vitest';
import { configManager } from '../../src/config/manager.js';
import { closeDatabase, initDatabase } from '../../src/db/index.js';
import { resetAllTables } from './helpers/db-reset.js';

beforeAll(() => {
  // In-memory SQLite for all integration tests
  initDatabase(':memory:');
});

afterEach(() => {
  resetAllTables();
  configManager.reset();
});

afterAll(() => {
  closeDatabase();
});
