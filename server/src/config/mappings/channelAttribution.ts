/**
 * Channel Attribution Mapping Configuration
 *
 * Maps each sales channel to the ERP codes its orders are booked under.
 *
 * BUSINESS RULES:
 * 1. One rule per channel; an order from a channel with no rule fails validation
 * 2. Operating unit and location are prefix + store code
 * 3. The store code comes from `storeCodes` when the store is listed there,
 *    otherwise it is derived from the marketplace store id
 *
 * TO ADD A NEW CHANNEL:
 * 1. Add a new entry to CHANNEL_ATTRIBUTION_RULES
 * 2. Pick a transaction prefix no other channel uses
 * 3. Add a description explaining the channel
 */

import type { ChannelAttributionRule } from '@order-bridge/shared/domain';

// ============================================
// RULE DEFINITIONS
// ============================================

export const CHANNEL_ATTRIBUTION_RULES: ChannelAttributionRule[] = [
    {
        channel: 'uber_eats',
        operatingUnitPrefix: 'OU-UE-',
        locationPrefix: 'LOC-UE-',
        transactionPrefix: 'UE',
        serviceFeeProductId: 'SVC-UE-FEE',
        storeCodes: {},
        description: 'Delivery marketplace orders, one operating unit per store',
    },
    {
        channel: 'doordash',
        operatingUnitPrefix: 'OU-DD-',
        locationPrefix: 'LOC-DD-',
        transactionPrefix: 'DD',
        serviceFeeProductId: 'SVC-DD-FEE',
        description: 'Second delivery marketplace, same store-code derivation',
    },
];
