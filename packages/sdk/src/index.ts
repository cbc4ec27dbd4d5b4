/**
 * @relaylog/sdk: levels, entries and the target contract.
 */

export * from './types.js';
export * from './entry.js';
export * from './target.js';
export * from './filter.js';
export * from './testing.js';
