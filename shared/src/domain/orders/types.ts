/**
 * Normalized Order Model
 *
 * Channel-independent shape produced by the order transformer and consumed
 * by the order store and the batch exporter.
 *
 * Money fields are MinorUnits (cents), quantities are MilliQuantity.
 */

import type { MinorUnits, MilliQuantity } from './money.js';
import type { ProcessingStatus } from './processingStatus.js';

// ============================================
// IDENTITY
// ============================================

/** (channel, source-order-id) - the idempotency key used everywhere */
export interface OrderKey {
    channel: string;
    sourceOrderId: string;
}

export function orderKeyToString(key: OrderKey): string {
    return `${key.channel}:${key.sourceOrderId}`;
}

// ============================================
// NORMALIZED ENTITIES
// ============================================

export interface NormalizedOrder extends OrderKey {
    displayId: string;
    storeId: string;
    operatingUnit: string;
    location: string;
    placedAt: string;
    currency: string;
    lifecycleState: string;

    // Privacy-constrained - the marketplace may withhold these
    customerName: string | null;
    customerPhone: string | null;
    deliveryStreet: string | null;
    deliveryCity: string | null;
    deliveryPostalCode: string | null;
    deliveryCountry: string | null;

    subtotal: MinorUnits;
    discount: MinorUnits;
    tax: MinorUnits;
    total: MinorUnits;
}

export type KitRole = 'none' | 'parent' | 'component';

export interface OrderLine {
    /** 1-based, contiguous per order */
    lineNumber: number;
    productId: string;
    description: string;
    quantity: MilliQuantity;
    unitPrice: MinorUnits;
    discount: MinorUnits;
    tax: MinorUnits;
    lineTotal: MinorUnits;
    isServiceCharge: boolean;
    kitRole: KitRole;
    /** Set on kit component lines only */
    kitParentProductId: string | null;
}

export interface FulfillmentLine {
    lineNumber: number;
    productId: string;
    quantitySupplied: MilliQuantity;
    priceSupplied: MinorUnits;
    fulfillmentType: 'Exact';
}

export interface OrderPayment {
    sequence: number;
    tenderType: string;
    amount: MinorUnits;
}

export interface OrderAttribute {
    name: string;
    value: string;
}

/**
 * Everything the transformer produces for one order.
 */
export interface NormalizedOrderBundle {
    order: NormalizedOrder;
    lines: OrderLine[];
    fulfillmentLines: FulfillmentLine[];
    payments: OrderPayment[];
    attributes: OrderAttribute[];
}

// ============================================
// REFERENCE DATA
// ============================================

export interface KitDefinition {
    parentProductId: string;
    /** Ordered list of component SKUs */
    componentProductIds: string[];
}

// ============================================
// PERSISTENCE VIEW
// ============================================

export type FailureKind = 'ValidationError' | 'TransientUpstreamError' | 'StateRaceError';

export interface OrderFailure {
    kind: FailureKind;
    message: string;
    /** Original payload reference for manual replay */
    resourceHref: string;
    at: string;
}

/**
 * What the order store holds for one key
 */
export interface StoredOrder extends OrderKey {
    processingStatus: ProcessingStatus;
    resourceHref: string;
    bundle: NormalizedOrderBundle | null;
    failure: OrderFailure | null;
    exportBatchId: string | null;
    updatedAt: string;
}
