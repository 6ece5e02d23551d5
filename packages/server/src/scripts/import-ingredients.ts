/**
 * Load ingredients from a JSON file of `{ name, measurement_unit }` records.
 * Pairs already in the database are skipped.
 *
 * Usage:
 *   npm run import:ingredients -- [path/to/ingredients.json]
 */
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createIngredientSchema, type CreateIngredientDTO } from '@foodgram/shared';
import { error as logError, info } from 'firebase-functions/logger';
import { loadConfig } from '../config.js';
import { closeDatabase, initializeDatabase } from '../db/index.js';
import { createServices } from '../services/index.js';

const DEFAULT_FILE = fileURLToPath(new URL('../../data/ingredients.json', import.meta.url));

const ingredientFileSchema = z.array(createIngredientSchema);

function readIngredientFile(filePath: string): CreateIngredientDTO[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return ingredientFileSchema.parse(raw);
}

function main(): void {
  const filePath = process.argv[2] ?? DEFAULT_FILE;
  const config = loadConfig();

  try {
    const items = readIngredientFile(filePath);
    const db = initializeDatabase(config.databasePath);
    const added = createServices(db).ingredients.import(items);
    info('Ingredients imported', { filePath, total: items.length, added });
  } catch (err) {
    logError(`Failed to import ingredients from "${filePath}"`, err);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main();
