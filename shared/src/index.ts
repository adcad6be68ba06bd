/**
 * @order-bridge/shared - Shared domain logic and schemas for Order Bridge
 *
 * Pure functions and Zod schemas used by the pipeline server and the CLI.
 * Nothing in this package performs I/O.
 */

export * from './schemas/index.js';
export * from './errors/index.js';
export * from './domain/index.js';
