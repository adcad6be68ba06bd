/**
 * Shared Zod schemas for Order Bridge
 *
 * Marketplace wire shapes, reference data files and the admin API contract.
 */

export * from './marketplace.js';
export * from './referenceData.js';
export * from './pipelineAdmin.js';
