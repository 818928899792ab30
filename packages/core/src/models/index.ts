export * from './repository.js';
export * from './config.js';
