import type { Express } from 'express';
import type Database from 'better-sqlite3';
import { createApp } from '../app.js';
import type { AppConfig } from '../config.js';
import { createDatabase, setTestDatabase } from '../db/index.js';
import { createRepositories, resetRepositories, type Repositories } from '../repositories/index.js';
import { resetServices } from '../services/index.js';

export interface TestContext {
  app: Express;
  db: Database.Database;
  repos: Repositories;
  config: AppConfig;
}

export const TEST_CONFIG: AppConfig = {
  port: 3001,
  databasePath: ':memory:',
  publicUrl: 'http://foodgram.test',
  pageSize: 6,
};

export function setupTestApp(config: AppConfig = TEST_CONFIG): TestContext {
  // Reset repository and service singletons to ensure fresh instances
  resetRepositories();
  resetServices();

  const db = createDatabase(':memory:');
  setTestDatabase(db);

  return {
    app: createApp(config),
    db,
    repos: createRepositories(db),
    config,
  };
}

export function teardownTestApp(ctx: TestContext): void {
  setTestDatabase(null);
  resetRepositories();
  resetServices();
  ctx.db.close();
}
