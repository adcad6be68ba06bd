/**
 * Package Builder
 *
 * Turns a batch of Persisted orders into the rows of the four entity files.
 * Pure: no clock, no I/O.
 *
 * Every row of one order carries the same transaction id, built from the
 * channel rule's transaction prefix and the source order id.
 */

import {
    buildTransactionId,
    findAttributionRule,
    type ChannelAttributionRule,
    type StoredOrder,
} from '@order-bridge/shared/domain';
import {
    PAYMENT_LINE_COLUMNS,
    SALES_LINE_COLUMNS,
    TAX_LINE_COLUMNS,
    TRANSACTION_HEADER_COLUMNS,
    applyColumnMap,
} from './columnMaps.js';
import type { ExportPackage } from './types.js';

export function buildPackage(orders: readonly StoredOrder[], rules: readonly ChannelAttributionRule[]): ExportPackage {
    const pkg: ExportPackage = {
        rows: { TransactionHeaders: [], SalesLines: [], PaymentLines: [], TaxLines: [] },
        keys: [],
        excluded: [],
    };

    for (const order of orders) {
        const key = { channel: order.channel, sourceOrderId: order.sourceOrderId };
        const bundle = order.bundle;
        if (!bundle) {
            pkg.excluded.push({ ...key, reason: 'Persisted order has no normalized bundle' });
            continue;
        }

        const rule = findAttributionRule(rules, order.channel);
        if (!rule) {
            pkg.excluded.push({ ...key, reason: `No attribution rule for channel ${order.channel}` });
            continue;
        }

        const transactionId = buildTransactionId(rule, order.sourceOrderId);
        const currency = bundle.order.currency;
        const fulfillmentByLine = new Map(bundle.fulfillmentLines.map(f => [f.lineNumber, f]));

        pkg.rows.TransactionHeaders.push(applyColumnMap(TRANSACTION_HEADER_COLUMNS, { transactionId, bundle }));

        for (const line of bundle.lines) {
            pkg.rows.SalesLines.push(
                applyColumnMap(SALES_LINE_COLUMNS, { transactionId, line, fulfillment: fulfillmentByLine.get(line.lineNumber) })
            );
            // One tax line per sales line, zero tax included
            pkg.rows.TaxLines.push(applyColumnMap(TAX_LINE_COLUMNS, { transactionId, currency, line }));
        }

        for (const payment of bundle.payments) {
            pkg.rows.PaymentLines.push(applyColumnMap(PAYMENT_LINE_COLUMNS, { transactionId, currency, payment }));
        }

        pkg.keys.push(key);
    }

    return pkg;
}
