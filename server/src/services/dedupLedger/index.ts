export * from './types.js';
export { InMemoryDedupLedger } from './inMemoryLedger.js';
export { KyselyDedupLedger } from './kyselyLedger.js';
