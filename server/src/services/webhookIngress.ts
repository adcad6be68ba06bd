/**
 * Webhook Ingress
 *
 * Turns one marketplace order notification into an intake decision.
 *
 * ORDER OF CHECKS:
 * 1. Signature: lowercase hex HMAC-SHA256 of the raw body, constant-time compare
 * 2. JSON parse + schema validation
 * 3. Status filter: only HANDED_OFF notifications are ingested
 * 4. Order intake under the acknowledgment deadline
 *
 * Throws the typed pipeline errors; the route maps them to HTTP responses.
 */

import crypto from 'node:crypto';
import { orderWebhookSchema } from '@order-bridge/shared/schemas';
import { QUALIFYING_WEBHOOK_STATUS } from '../config/pipeline.js';
import { AuthenticationError, ValidationError } from '../utils/errors.js';
import { withDeadline } from '../utils/async.js';
import { webhookLogger as log } from '../utils/logger.js';
import type { OrderIntake } from './orderIntake.js';

// ============================================
// TYPES
// ============================================

export interface WebhookIngressDeps {
    intake: Pick<OrderIntake, 'admit'>;
    secret: string;
    channel: string;
    ackDeadlineMs: number;
}

export type WebhookAck =
    | { received: true; ignored: true }
    | { received: true; duplicate: true }
    | { received: true; queued: true };

// ============================================
// SIGNATURE
// ============================================

export function signWebhookBody(rawBody: Buffer | string, secret: string): string {
    return crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
}

export function verifyWebhookSignature(rawBody: Buffer, signature: string | undefined, secret: string): boolean {
    if (!signature) return false;

    const expected = Buffer.from(signWebhookBody(rawBody, secret), 'utf8');
    const received = Buffer.from(signature, 'utf8');

    // timingSafeEqual throws on a length mismatch
    if (expected.length !== received.length) return false;
    return crypto.timingSafeEqual(expected, received);
}

// ============================================
// HANDLER
// ============================================

function parseJson(rawBody: Buffer): unknown {
    try {
        return JSON.parse(rawBody.toString('utf8'));
    } catch {
        throw new ValidationError('Webhook body is not valid JSON');
    }
}

/**
 * @throws AuthenticationError on a missing or invalid signature
 * @throws ValidationError on a malformed body
 * @throws LedgerUnavailableError, QueueUnavailableError, DeadlineExceededError from intake
 */
export async function handleOrderWebhook(
    deps: WebhookIngressDeps,
    rawBody: Buffer | undefined,
    signature: string | undefined
): Promise<WebhookAck> {
    if (!rawBody) {
        log.error('Webhook rawBody not captured - signature verification will fail');
        throw new AuthenticationError('Webhook verification failed');
    }

    if (!verifyWebhookSignature(rawBody, signature, deps.secret)) {
        log.warn({ hasSignature: Boolean(signature) }, 'Webhook verification failed');
        throw new AuthenticationError('Webhook verification failed');
    }

    const parsed = orderWebhookSchema.safeParse(parseJson(rawBody));
    if (!parsed.success) {
        throw new ValidationError('Invalid webhook payload', parsed.error.issues);
    }

    const { meta, resource_href: resourceHref } = parsed.data;
    if (meta.status !== QUALIFYING_WEBHOOK_STATUS) {
        log.debug({ sourceOrderId: meta.order_id, status: meta.status }, 'Ignoring non-qualifying status');
        return { received: true, ignored: true };
    }

    const result = await withDeadline(
        deps.intake.admit({
            channel: deps.channel,
            sourceOrderId: meta.order_id,
            source: 'webhook',
            resourceHref,
        }),
        deps.ackDeadlineMs,
        'Webhook intake'
    );

    log.info({ channel: deps.channel, sourceOrderId: meta.order_id, storeId: meta.store_id, result }, 'Webhook processed');
    return result === 'duplicate' ? { received: true, duplicate: true } : { received: true, queued: true };
}
