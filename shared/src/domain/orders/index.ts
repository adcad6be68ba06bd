/**
 * Orders Domain Layer
 *
 * Pure order-integration logic: money arithmetic, processing status machine,
 * kit expansion, channel attribution and the order transformer.
 * Shared between the pipeline server and the operator CLI.
 */

export * from './money.js';
export * from './types.js';
export * from './processingStatus.js';
export * from './channelAttribution.js';
export * from './kitExpansion.js';
export * from './transformer.js';
