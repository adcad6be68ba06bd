/**
 * Marketplace Zod Schemas
 *
 * Wire shapes for the delivery marketplace: the inbound webhook notification,
 * the order detail resource (with cart, delivery and payment expanded) and
 * the paginated order list used by the reconciliation sweep.
 *
 * All monetary values on the wire are integers scaled by 100,000 (E5).
 */

import { z } from 'zod';

// ============================================
// COMMON
// ============================================

export const e5AmountSchema = z.object({
    amount_e5: z.number().int(),
});

// ============================================
// WEBHOOK
// ============================================

export const orderWebhookSchema = z.object({
    event_type: z.string().min(1),
    resource_href: z.string().url(),
    meta: z.object({
        order_id: z.string().min(1),
        store_id: z.string().min(1),
        status: z.string().min(1),
    }),
});

export type OrderWebhookPayload = z.infer<typeof orderWebhookSchema>;

// ============================================
// ORDER DETAIL
// ============================================

export const marketplaceCartItemSchema = z.object({
    id: z.string().min(1),
    /** Merchant SKU */
    external_data: z.string().min(1),
    title: z.string(),
    quantity: z.number().positive(),
    price: z.object({
        unit_price: e5AmountSchema,
        total_price: e5AmountSchema.optional(),
    }),
    discount: e5AmountSchema.optional(),
    tax: e5AmountSchema.optional(),
});

export const marketplaceFeeSchema = z.object({
    type: z.string().min(1),
    name: z.string().optional(),
    amount_e5: z.number().int(),
    tax_e5: z.number().int().optional(),
});

export const marketplaceTenderSchema = z.object({
    type: z.string().min(1),
    amount_e5: z.number().int(),
});

export const marketplaceOrderSchema = z.object({
    id: z.string().min(1),
    display_id: z.string(),
    state: z.string().min(1),
    currency_code: z.string().length(3),
    placed_at: z.string(),
    store: z.object({
        id: z.string().min(1),
        name: z.string().optional(),
    }),
    eater: z
        .object({
            first_name: z.string().nullish(),
            last_name: z.string().nullish(),
            phone: z.string().nullish(),
        })
        .nullish(),
    delivery: z
        .object({
            location: z
                .object({
                    street_address: z.string().nullish(),
                    city: z.string().nullish(),
                    postal_code: z.string().nullish(),
                    country: z.string().nullish(),
                })
                .nullish(),
        })
        .nullish(),
    cart: z.object({
        items: z.array(marketplaceCartItemSchema),
    }),
    payment: z.object({
        charges: z.object({
            total: e5AmountSchema.optional(),
        }).default({}),
        fees: z.array(marketplaceFeeSchema).default([]),
        tenders: z.array(marketplaceTenderSchema).default([]),
    }),
});

export type MarketplaceCartItem = z.infer<typeof marketplaceCartItemSchema>;
export type MarketplaceFee = z.infer<typeof marketplaceFeeSchema>;
export type MarketplaceTender = z.infer<typeof marketplaceTenderSchema>;
export type MarketplaceOrder = z.infer<typeof marketplaceOrderSchema>;
export type MarketplaceOrderInput = z.input<typeof marketplaceOrderSchema>;

// ============================================
// ORDER LIST (reconciliation)
// ============================================

export const marketplaceOrderSummarySchema = z.object({
    id: z.string().min(1),
    store_id: z.string().min(1),
    state: z.string().min(1),
    resource_href: z.string().url(),
});

export const marketplaceOrderPageSchema = z.object({
    orders: z.array(marketplaceOrderSummarySchema),
    next_page_token: z.string().nullish(),
});

export type MarketplaceOrderSummary = z.infer<typeof marketplaceOrderSummarySchema>;
export type MarketplaceOrderPage = z.infer<typeof marketplaceOrderPageSchema>;
