/**
 * Order Transformer - Pure Domain Logic
 *
 * Maps a fetched marketplace order into the normalized model:
 * order header, order lines, fulfillment lines, payments and attributes.
 *
 * Deterministic: no clock, no randomness, no I/O. Transforming the same
 * input twice yields JSON-identical output.
 *
 * STEPS:
 * 1. Resolve the channel attribution rule (operating unit / location)
 * 2. One line per cart item, amounts converted from E5
 * 3. Kit expansion on product lines
 * 4. One service-charge line per marketplace fee, appended after product lines
 * 5. Resequence, derive totals, allocate payments, mirror fulfillment
 *
 * @module domain/orders/transformer
 */

import type { MarketplaceCartItem, MarketplaceFee, MarketplaceOrder, MarketplaceTender } from '../../schemas/marketplace.js';
import { TransformError, TRANSFORM_ERROR_CODES } from '../../errors/transform.js';
import { attributeChannel, findAttributionRule, type ChannelAttributionRule } from './channelAttribution.js';
import { expandKits, resequenceLines, type KitLookup } from './kitExpansion.js';
import {
    MILLI_PER_UNIT,
    computeLineTotal,
    e5ToMinor,
    extendAmount,
    formatMinor,
    toMilliQuantity,
    type MinorUnits,
} from './money.js';
import type {
    FulfillmentLine,
    NormalizedOrder,
    NormalizedOrderBundle,
    OrderAttribute,
    OrderLine,
    OrderPayment,
} from './types.js';

// ============================================
// TYPES
// ============================================

export interface TransformContext {
    channel: string;
    attributionRules: readonly ChannelAttributionRule[];
    kits: KitLookup;
}

export interface OrderTotals {
    subtotal: MinorUnits;
    discount: MinorUnits;
    tax: MinorUnits;
    total: MinorUnits;
}

/** Tender type used when the marketplace reports no tender breakdown */
export const DEFAULT_TENDER_TYPE = 'MARKETPLACE';

// ============================================
// LINE BUILDERS
// ============================================

function assertNonNegative(sourceOrderId: string, field: string, value: MinorUnits): void {
    if (value < 0) {
        throw new TransformError(TRANSFORM_ERROR_CODES.NEGATIVE_AMOUNT, {
            technicalMessage: `Order ${sourceOrderId}: ${field} is negative (${formatMinor(value)})`,
            context: { sourceOrderId, field },
        });
    }
}

export function buildCartLine(sourceOrderId: string, item: MarketplaceCartItem, lineNumber: number): OrderLine {
    const quantity = toMilliQuantity(item.quantity);
    if (quantity <= 0) {
        throw new TransformError(TRANSFORM_ERROR_CODES.INVALID_QUANTITY, {
            context: { sourceOrderId, itemId: item.id, quantity: item.quantity },
        });
    }

    const unitPrice = e5ToMinor(item.price.unit_price.amount_e5);
    const discount = e5ToMinor(item.discount?.amount_e5 ?? 0);
    const tax = e5ToMinor(item.tax?.amount_e5 ?? 0);
    assertNonNegative(sourceOrderId, `item ${item.id} unit price`, unitPrice);
    assertNonNegative(sourceOrderId, `item ${item.id} discount`, discount);
    assertNonNegative(sourceOrderId, `item ${item.id} tax`, tax);

    return {
        lineNumber,
        productId: item.external_data,
        description: item.title,
        quantity,
        unitPrice,
        discount,
        tax,
        lineTotal: computeLineTotal(unitPrice, quantity, discount),
        isServiceCharge: false,
        kitRole: 'none',
        kitParentProductId: null,
    };
}

export function buildServiceFeeLine(
    sourceOrderId: string,
    fee: MarketplaceFee,
    rule: ChannelAttributionRule,
    lineNumber: number
): OrderLine {
    const unitPrice = e5ToMinor(fee.amount_e5);
    const tax = e5ToMinor(fee.tax_e5 ?? 0);
    assertNonNegative(sourceOrderId, `fee ${fee.type} amount`, unitPrice);
    assertNonNegative(sourceOrderId, `fee ${fee.type} tax`, tax);

    return {
        lineNumber,
        productId: rule.serviceFeeProductId,
        description: fee.name ?? fee.type,
        quantity: MILLI_PER_UNIT,
        unitPrice,
        discount: 0,
        tax,
        lineTotal: computeLineTotal(unitPrice, MILLI_PER_UNIT, 0),
        isServiceCharge: true,
        kitRole: 'none',
        kitParentProductId: null,
    };
}

export function mirrorFulfillment(lines: readonly OrderLine[]): FulfillmentLine[] {
    return lines.map(line => ({
        lineNumber: line.lineNumber,
        productId: line.productId,
        quantitySupplied: line.quantity,
        priceSupplied: line.unitPrice,
        fulfillmentType: 'Exact',
    }));
}

// ============================================
// TOTALS & PAYMENTS
// ============================================

export function computeOrderTotals(lines: readonly OrderLine[]): OrderTotals {
    let subtotal = 0;
    let discount = 0;
    let tax = 0;
    for (const line of lines) {
        subtotal += extendAmount(line.unitPrice, line.quantity);
        discount += line.discount;
        tax += line.tax;
    }
    return { subtotal, discount, tax, total: subtotal - discount + tax };
}

/**
 * One payment per tender; the last absorbs the E5 rounding remainder so that
 * payments always sum to the order total. When the tenders exceed the total,
 * the excess comes off the last payment first, then earlier ones, and no
 * payment goes below zero.
 *
 * @throws TransformError when the total itself is negative
 */
export function allocatePayments(tenders: readonly MarketplaceTender[], total: MinorUnits): OrderPayment[] {
    if (total < 0) {
        throw new TransformError(TRANSFORM_ERROR_CODES.NEGATIVE_AMOUNT, {
            technicalMessage: `Order total is negative (${formatMinor(total)})`,
            context: { total },
        });
    }
    if (tenders.length === 0) {
        return [{ sequence: 1, tenderType: DEFAULT_TENDER_TYPE, amount: total }];
    }

    const payments: OrderPayment[] = tenders.map((tender, index) => ({
        sequence: index + 1,
        tenderType: tender.type,
        amount: e5ToMinor(tender.amount_e5),
    }));

    const allocated = payments.reduce((sum, p) => sum + p.amount, 0);
    let remainder = total - allocated;
    for (let i = payments.length - 1; i >= 0 && remainder !== 0; i--) {
        const payment = payments[i];
        if (!payment) continue;
        const adjusted = Math.max(0, payment.amount + remainder);
        remainder -= adjusted - payment.amount;
        payment.amount = adjusted;
    }
    return payments;
}

// ============================================
// HEADER
// ============================================

function joinName(first: string | null | undefined, last: string | null | undefined): string | null {
    const name = [first, last].filter((part): part is string => !!part && part.trim() !== '').map(p => p.trim()).join(' ');
    return name === '' ? null : name;
}

function buildAttributes(source: MarketplaceOrder, lines: readonly OrderLine[], expandedKits: number): OrderAttribute[] {
    const attributes: OrderAttribute[] = [
        { name: 'SourceDisplayId', value: source.display_id },
        { name: 'ServiceFeeCount', value: String(lines.filter(l => l.isServiceCharge).length) },
        { name: 'KitCount', value: String(expandedKits) },
    ];
    const sourceTotal = source.payment.charges.total;
    if (sourceTotal) {
        attributes.push({ name: 'SourceTotal', value: formatMinor(e5ToMinor(sourceTotal.amount_e5)) });
    }
    if (source.store.name) {
        attributes.push({ name: 'StoreName', value: source.store.name });
    }
    return attributes;
}

// ============================================
// MAIN
// ============================================

/**
 * Transform a fetched marketplace order into the normalized bundle.
 *
 * @throws TransformError when the order cannot be normalized
 */
export function transformOrder(source: MarketplaceOrder, context: TransformContext): NormalizedOrderBundle {
    const rule = findAttributionRule(context.attributionRules, context.channel);
    if (!rule) {
        throw new TransformError(TRANSFORM_ERROR_CODES.NO_ATTRIBUTION_RULE, {
            context: { channel: context.channel, sourceOrderId: source.id },
        });
    }

    if (source.cart.items.length === 0) {
        throw new TransformError(TRANSFORM_ERROR_CODES.EMPTY_CART, { context: { sourceOrderId: source.id } });
    }

    const productLines = source.cart.items.map((item, index) => buildCartLine(source.id, item, index + 1));
    const { lines: expandedLines, expandedKits } = expandKits(productLines, context.kits);

    const serviceLines = source.payment.fees.map((fee, index) =>
        buildServiceFeeLine(source.id, fee, rule, expandedLines.length + index + 1)
    );

    const lines = resequenceLines([...expandedLines, ...serviceLines]);
    const totals = computeOrderTotals(lines);
    const { operatingUnit, location } = attributeChannel(rule, source.store.id);
    const address = source.delivery?.location;

    const order: NormalizedOrder = {
        channel: context.channel,
        sourceOrderId: source.id,
        displayId: source.display_id,
        storeId: source.store.id,
        operatingUnit,
        location,
        placedAt: source.placed_at,
        currency: source.currency_code.toUpperCase(),
        lifecycleState: source.state,
        customerName: joinName(source.eater?.first_name, source.eater?.last_name),
        customerPhone: source.eater?.phone ?? null,
        deliveryStreet: address?.street_address ?? null,
        deliveryCity: address?.city ?? null,
        deliveryPostalCode: address?.postal_code ?? null,
        deliveryCountry: address?.country ?? null,
        ...totals,
    };

    return {
        order,
        lines,
        fulfillmentLines: mirrorFulfillment(lines),
        payments: allocatePayments(source.payment.tenders, totals.total),
        attributes: buildAttributes(source, lines, expandedKits),
    };
}
