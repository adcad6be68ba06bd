/**
 * Centralized Configuration System
 *
 * STRUCTURE:
 * - /env.ts      - Validated environment (composition root only)
 * - /pipeline.ts - Marketplace states, circuit breaker and pipeline tunables
 * - /mappings    - Channel → ERP attribution rules
 * - /kits.ts     - Kit reference data loader
 *
 * env.ts is deliberately NOT re-exported here: importing it parses
 * process.env and exits on failure.
 */

// ============================================
// PIPELINE
// ============================================

export {
    QUALIFYING_WEBHOOK_STATUS,
    ELIGIBLE_ORDER_STATES,
    ORDER_DETAIL_EXPAND,
    RECONCILE_MAX_PAGES,
    PERSIST_ATTEMPT_BASE_DELAY_MS,
    CIRCUIT_BREAKER_CONFIG,
    buildPipelineConfig,
    type PipelineConfig,
} from './pipeline.js';

// ============================================
// MAPPING RULES
// ============================================

export { CHANNEL_ATTRIBUTION_RULES } from './mappings/index.js';

// ============================================
// REFERENCE DATA
// ============================================

export { loadKitDefinitions, DEFAULT_KIT_DEFINITIONS_PATH } from './kits.js';
