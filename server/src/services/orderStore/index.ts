export * from './types.js';
export { InMemoryOrderStore } from './inMemoryOrderStore.js';
export { KyselyOrderStore } from './kyselyOrderStore.js';
