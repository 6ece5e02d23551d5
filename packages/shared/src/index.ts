export * from './constants.js';
export * from './types/index.js';
export * from './schemas/index.js';
