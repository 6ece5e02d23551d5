export * from './user.schema.js';
export * from './ingredient.schema.js';
export * from './recipe.schema.js';
export * from './query.schema.js';
