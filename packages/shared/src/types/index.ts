export * from './api.js';
export * from './user.js';
export * from './ingredient.js';
export * from './recipe.js';
export * from './shopping-list.js';
