export * from './types.js';
export { StaticTokenProvider } from './tokenProvider.js';
export { MarketplaceClient, marketplaceApiCircuit, isTransientRequestError } from './client.js';
