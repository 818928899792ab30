// Re-export models
export * from './models/index.js';

export * from './errors.js';

// Path matching
export * from './matching/path-matcher.js';

// Version control port and its git adapter
export * from './vcs/types.js';
export * from './vcs/short-status.js';
export * from './vcs/git-provider.js';

// Discovery and the repository cache
export * from './discovery/discoverer.js';
export * from './cache/fingerprint.js';
export * from './cache/paths.js';
export * from './cache/cache-store.js';
export * from './cache/ignore-list.js';
export * from './inventory/inventory.js';

// Parallel execution
export * from './parallel/executor.js';
export * from './operations/queries.js';
