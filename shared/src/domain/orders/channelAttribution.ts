/**
 * Channel Attribution - Pure Domain Logic
 *
 * Derives the ERP operating unit and location codes for an order from its
 * channel and marketplace store. One prefix rule per channel.
 *
 * @example
 * // rule { operatingUnitPrefix: 'OU-UE-', locationPrefix: 'LOC-UE-' }, store 'st-9a8b'
 * // → operatingUnit 'OU-UE-ST9A8B', location 'LOC-UE-ST9A8B'
 */

// ============================================
// TYPES
// ============================================

export interface ChannelAttributionRule {
    channel: string;
    operatingUnitPrefix: string;
    locationPrefix: string;
    /** Prefix of the ERP transaction identifier */
    transactionPrefix: string;
    /** Product id used for synthesized service-fee lines */
    serviceFeeProductId: string;
    /** Explicit store id → store code overrides */
    storeCodes?: Record<string, string>;
    description: string;
}

export interface ChannelAttribution {
    operatingUnit: string;
    location: string;
}

// ============================================
// CONSTANTS
// ============================================

const MAX_STORE_CODE_LENGTH = 10;

// ============================================
// FUNCTIONS
// ============================================

/**
 * Store code: mapped override, or the store id upper-cased with
 * non-alphanumerics removed, truncated to 10 characters.
 */
export function deriveStoreCode(rule: ChannelAttributionRule, storeId: string): string {
    const mapped = rule.storeCodes?.[storeId];
    if (mapped) return mapped;
    return storeId.toUpperCase().replace(/[^A-Z0-9]/g, '').slice(0, MAX_STORE_CODE_LENGTH);
}

export function attributeChannel(rule: ChannelAttributionRule, storeId: string): ChannelAttribution {
    const storeCode = deriveStoreCode(rule, storeId);
    return {
        operatingUnit: `${rule.operatingUnitPrefix}${storeCode}`,
        location: `${rule.locationPrefix}${storeCode}`,
    };
}

/**
 * ERP transaction identifier, stable for a given (channel, source-order-id).
 */
export function buildTransactionId(rule: ChannelAttributionRule, sourceOrderId: string): string {
    return `${rule.transactionPrefix}-${sourceOrderId}`;
}

export function findAttributionRule(
    rules: readonly ChannelAttributionRule[],
    channel: string
): ChannelAttributionRule | null {
    return rules.find(r => r.channel === channel) ?? null;
}
