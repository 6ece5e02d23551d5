import type { Migration } from '../migrator.js';
import { migration as m001 } from './001_create_users.js';
import { migration as m002 } from './002_create_ingredients.js';
import { migration as m003 } from './003_create_recipes.js';
import { migration as m004 } from './004_create_recipe_relations.js';
import { migration as m005 } from './005_create_subscriptions.js';

export const migrations: Migration[] = [m001, m002, m003, m004, m005];
