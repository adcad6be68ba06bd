/**
 * Domain Layer
 *
 * Core business logic with no I/O.
 * Shared between the pipeline server and the operator CLI.
 */

export * from './orders/index.js';
