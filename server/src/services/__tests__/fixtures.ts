/**
 * Marketplace order bodies shared by the server tests
 */

import type { MarketplaceOrderInput } from '@order-bridge/shared/schemas';

export function orderBody(sourceOrderId: string, overrides: Partial<MarketplaceOrderInput> = {}): MarketplaceOrderInput {
    return {
        id: sourceOrderId,
        display_id: sourceOrderId.toUpperCase(),
        state: 'HANDED_OFF',
        currency_code: 'EUR',
        placed_at: '2026-03-14T12:00:00Z',
        store: { id: 'st-1', name: 'Test Store' },
        cart: {
            items: [
                {
                    id: `${sourceOrderId}-1`,
                    external_data: 'SKU-BURGER',
                    title: 'Burger',
                    quantity: 2,
                    price: { unit_price: { amount_e5: 850_000 } },
                    tax: { amount_e5: 153_000 },
                },
            ],
        },
        payment: {
            charges: { total: { amount_e5: 1_853_000 } },
            fees: [],
            tenders: [],
        },
        ...overrides,
    };
}

export function hrefFor(sourceOrderId: string): string {
    return `https://api.marketplace.test/v1/orders/${sourceOrderId}`;
}
