/**
 * Export Column Maps
 *
 * One map per entity file: column name → value extractor. Column order in
 * the map is column order in the file.
 *
 * RENDERING:
 * - Money: 2 decimals ("12.50")
 * - Quantity: 3 decimals ("1.000")
 * - Flags: Yes / No
 * - Missing optional values: empty string
 *
 * TO ADD A COLUMN:
 * 1. Add an entry to the entity's map
 * 2. If the validator reads it, update integrityValidator.ts
 */

import {
    formatMinor,
    formatQuantity,
    type FulfillmentLine,
    type NormalizedOrderBundle,
    type OrderLine,
    type OrderPayment,
} from '@order-bridge/shared/domain';
import type { ExportEntity, ExportRow } from './types.js';

// ============================================
// TYPES
// ============================================

export interface ColumnMapping<T> {
    column: string;
    value: (source: T) => string;
}

export interface HeaderSource {
    transactionId: string;
    bundle: NormalizedOrderBundle;
}

export interface SalesLineSource {
    transactionId: string;
    line: OrderLine;
    fulfillment: FulfillmentLine | undefined;
}

export interface PaymentLineSource {
    transactionId: string;
    currency: string;
    payment: OrderPayment;
}

export interface TaxLineSource {
    transactionId: string;
    currency: string;
    line: OrderLine;
}

// ============================================
// FILE NAMES
// ============================================

export const EXPORT_FILE_NAMES: Record<ExportEntity, string> = {
    TransactionHeaders: 'TransactionHeaders.csv',
    SalesLines: 'SalesLines.csv',
    PaymentLines: 'PaymentLines.csv',
    TaxLines: 'TaxLines.csv',
};

/** Column every entity file carries to reference its transaction header */
export const TRANSACTION_ID_COLUMN = 'TransactionId';

// ============================================
// HELPERS
// ============================================

const flag = (value: boolean): string => (value ? 'Yes' : 'No');

const orEmpty = (value: string | null): string => value ?? '';

function attribute(bundle: NormalizedOrderBundle, name: string): string {
    return bundle.attributes.find(a => a.name === name)?.value ?? '';
}

// ============================================
// COLUMN MAPS
// ============================================

export const TRANSACTION_HEADER_COLUMNS: readonly ColumnMapping<HeaderSource>[] = [
    { column: TRANSACTION_ID_COLUMN, value: s => s.transactionId },
    { column: 'Channel', value: s => s.bundle.order.channel },
    { column: 'SourceOrderId', value: s => s.bundle.order.sourceOrderId },
    { column: 'DisplayId', value: s => s.bundle.order.displayId },
    { column: 'OperatingUnit', value: s => s.bundle.order.operatingUnit },
    { column: 'Location', value: s => s.bundle.order.location },
    { column: 'TransactionDate', value: s => s.bundle.order.placedAt },
    { column: 'Currency', value: s => s.bundle.order.currency },
    { column: 'LifecycleState', value: s => s.bundle.order.lifecycleState },
    { column: 'CustomerName', value: s => orEmpty(s.bundle.order.customerName) },
    { column: 'CustomerPhone', value: s => orEmpty(s.bundle.order.customerPhone) },
    { column: 'DeliveryStreet', value: s => orEmpty(s.bundle.order.deliveryStreet) },
    { column: 'DeliveryCity', value: s => orEmpty(s.bundle.order.deliveryCity) },
    { column: 'DeliveryPostalCode', value: s => orEmpty(s.bundle.order.deliveryPostalCode) },
    { column: 'DeliveryCountry', value: s => orEmpty(s.bundle.order.deliveryCountry) },
    { column: 'Subtotal', value: s => formatMinor(s.bundle.order.subtotal) },
    { column: 'Discount', value: s => formatMinor(s.bundle.order.discount) },
    { column: 'Tax', value: s => formatMinor(s.bundle.order.tax) },
    { column: 'Total', value: s => formatMinor(s.bundle.order.total) },
    { column: 'SourceDisplayId', value: s => attribute(s.bundle, 'SourceDisplayId') },
    { column: 'SourceTotal', value: s => attribute(s.bundle, 'SourceTotal') },
    { column: 'ServiceFeeCount', value: s => attribute(s.bundle, 'ServiceFeeCount') },
    { column: 'KitCount', value: s => attribute(s.bundle, 'KitCount') },
    { column: 'StoreName', value: s => attribute(s.bundle, 'StoreName') },
];

export const SALES_LINE_COLUMNS: readonly ColumnMapping<SalesLineSource>[] = [
    { column: TRANSACTION_ID_COLUMN, value: s => s.transactionId },
    { column: 'LineNumber', value: s => String(s.line.lineNumber) },
    { column: 'ProductId', value: s => s.line.productId },
    { column: 'Description', value: s => s.line.description },
    { column: 'Quantity', value: s => formatQuantity(s.line.quantity) },
    { column: 'UnitPrice', value: s => formatMinor(s.line.unitPrice) },
    { column: 'Discount', value: s => formatMinor(s.line.discount) },
    { column: 'LineAmount', value: s => formatMinor(s.line.lineTotal) },
    { column: 'IsServiceCharge', value: s => flag(s.line.isServiceCharge) },
    { column: 'KitRole', value: s => s.line.kitRole },
    { column: 'KitParentProductId', value: s => orEmpty(s.line.kitParentProductId) },
    { column: 'QuantitySupplied', value: s => (s.fulfillment ? formatQuantity(s.fulfillment.quantitySupplied) : '') },
    { column: 'PriceSupplied', value: s => (s.fulfillment ? formatMinor(s.fulfillment.priceSupplied) : '') },
    { column: 'FulfillmentType', value: s => s.fulfillment?.fulfillmentType ?? '' },
];

export const PAYMENT_LINE_COLUMNS: readonly ColumnMapping<PaymentLineSource>[] = [
    { column: TRANSACTION_ID_COLUMN, value: s => s.transactionId },
    { column: 'Sequence', value: s => String(s.payment.sequence) },
    { column: 'TenderType', value: s => s.payment.tenderType },
    { column: 'Amount', value: s => formatMinor(s.payment.amount) },
    { column: 'Currency', value: s => s.currency },
];

export const TAX_LINE_COLUMNS: readonly ColumnMapping<TaxLineSource>[] = [
    { column: TRANSACTION_ID_COLUMN, value: s => s.transactionId },
    { column: 'LineNumber', value: s => String(s.line.lineNumber) },
    { column: 'TaxableAmount', value: s => formatMinor(s.line.lineTotal) },
    { column: 'TaxAmount', value: s => formatMinor(s.line.tax) },
    { column: 'Currency', value: s => s.currency },
];

export const ENTITY_COLUMNS: Record<ExportEntity, readonly string[]> = {
    TransactionHeaders: TRANSACTION_HEADER_COLUMNS.map(c => c.column),
    SalesLines: SALES_LINE_COLUMNS.map(c => c.column),
    PaymentLines: PAYMENT_LINE_COLUMNS.map(c => c.column),
    TaxLines: TAX_LINE_COLUMNS.map(c => c.column),
};

export function applyColumnMap<T>(columns: readonly ColumnMapping<T>[], source: T): ExportRow {
    const row: ExportRow = {};
    for (const { column, value } of columns) {
        row[column] = value(source);
    }
    return row;
}
