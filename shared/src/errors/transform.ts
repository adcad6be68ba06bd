/**
 * Order Transform Error Utilities
 *
 * Error codes and the TransformError class raised by the pure order
 * transformer. The server maps every TransformError to a ValidationError
 * outcome (order marked Failed, not retried).
 */

// ============================================
// ERROR CODES
// ============================================

export const TRANSFORM_ERROR_CODES = {
  NO_ATTRIBUTION_RULE: 'NO_ATTRIBUTION_RULE',
  EMPTY_CART: 'EMPTY_CART',
  NEGATIVE_AMOUNT: 'NEGATIVE_AMOUNT',
  INVALID_QUANTITY: 'INVALID_QUANTITY',
} as const;

export type TransformErrorCode = (typeof TRANSFORM_ERROR_CODES)[keyof typeof TRANSFORM_ERROR_CODES];

// ============================================
// MESSAGES
// ============================================

export const TRANSFORM_ERROR_MESSAGES: Record<TransformErrorCode, string> = {
  [TRANSFORM_ERROR_CODES.NO_ATTRIBUTION_RULE]: 'No channel attribution rule is configured for this channel',
  [TRANSFORM_ERROR_CODES.EMPTY_CART]: 'Order has no cart items',
  [TRANSFORM_ERROR_CODES.NEGATIVE_AMOUNT]: 'Order contains a negative monetary amount',
  [TRANSFORM_ERROR_CODES.INVALID_QUANTITY]: 'Cart item quantity rounds to zero',
};

export function isTransformErrorCode(code: unknown): code is TransformErrorCode {
  return (
    typeof code === 'string' &&
    Object.values(TRANSFORM_ERROR_CODES).some(known => known === code)
  );
}

// ============================================
// TRANSFORM ERROR CLASS
// ============================================

export class TransformError extends Error {
  readonly code: TransformErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: TransformErrorCode,
    options?: {
      technicalMessage?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(options?.technicalMessage || TRANSFORM_ERROR_MESSAGES[code]);
    this.name = 'TransformError';
    this.code = code;
    this.context = options?.context;
    Object.setPrototypeOf(this, TransformError.prototype);
  }
}
