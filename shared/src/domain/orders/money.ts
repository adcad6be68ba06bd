/**
 * Money & Quantity Arithmetic - Pure Domain Logic
 *
 * The normalized model never stores floats for money:
 * - Amounts are integer minor units (cents) - 12.50 is stored as 1250
 * - Quantities are integer thousandths - 2 is stored as 2000, 0.125 as 125
 *
 * Marketplace amounts arrive as integers scaled by 100,000 ("E5").
 * All rounding is half-up (half away from zero for negative amounts).
 *
 * @module domain/orders/money
 */

// ============================================
// TYPES
// ============================================

/** Amount in minor currency units (cents) */
export type MinorUnits = number;

/** Quantity in thousandths (3 fractional digits) */
export type MilliQuantity = number;

// ============================================
// CONSTANTS
// ============================================

/** E5 units per minor unit: 100,000 / 100 */
export const E5_PER_MINOR_UNIT = 1000;

/** Thousandths per whole quantity */
export const MILLI_PER_UNIT = 1000;

/** Smallest currency unit, used as the kit component floor price */
export const MINIMAL_UNIT_PRICE: MinorUnits = 1;

// ============================================
// ROUNDING
// ============================================

/**
 * Integer division with half-up rounding.
 * Negative numerators round half away from zero, so -0.5 → -1.
 *
 * @example
 * roundHalfUpDiv(1250000, 1000) // 1250
 * roundHalfUpDiv(500, 1000)     // 1
 * roundHalfUpDiv(499, 1000)     // 0
 */
export function roundHalfUpDiv(numerator: number, denominator: number): number {
    if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || denominator <= 0) {
        throw new RangeError(`roundHalfUpDiv expects integers and a positive denominator, got ${numerator}/${denominator}`);
    }
    if (numerator < 0) {
        return -roundHalfUpDiv(-numerator, denominator);
    }
    return Math.floor((2 * numerator + denominator) / (2 * denominator));
}

// ============================================
// CONVERSIONS
// ============================================

/**
 * Convert an E5-scaled marketplace amount to minor units.
 *
 * @example
 * e5ToMinor(1250000) // 1250  (12.50)
 * e5ToMinor(1)       // 0     (0.00)
 * e5ToMinor(50000)   // 50    (0.50)
 */
export function e5ToMinor(amountE5: number): MinorUnits {
    return roundHalfUpDiv(amountE5, E5_PER_MINOR_UNIT);
}

/**
 * Convert a decimal quantity (e.g. 2 or 0.125) to thousandths.
 * Anything beyond 3 fractional digits is rounded half-up on the decimal
 * digits, not on the binary product (1.0005 → 1001).
 */
export function toMilliQuantity(quantity: number): MilliQuantity {
    if (!Number.isFinite(quantity)) {
        throw new RangeError(`Not a finite quantity: ${quantity}`);
    }
    const abs = Math.abs(quantity);
    const text = /e/i.test(String(abs)) ? abs.toFixed(20) : String(abs);
    const match = /^(\d+)(?:\.(\d+))?$/.exec(text);
    if (!match) {
        throw new RangeError(`Not a decimal quantity: ${quantity}`);
    }
    const [, whole = '0', fraction = ''] = match;
    const kept = Number(fraction.slice(0, 3).padEnd(3, '0'));
    const roundUp = (fraction[3] ?? '0') >= '5' ? 1 : 0;
    const scaled = Number(whole) * MILLI_PER_UNIT + kept + roundUp;
    return quantity < 0 ? -scaled : scaled;
}

/**
 * Extended amount: unit price × quantity, rounded to the cent.
 */
export function extendAmount(unitPrice: MinorUnits, quantity: MilliQuantity): MinorUnits {
    return roundHalfUpDiv(unitPrice * quantity, MILLI_PER_UNIT);
}

/**
 * Line total invariant: unit price × quantity − discount, rounded to 2 decimals.
 */
export function computeLineTotal(unitPrice: MinorUnits, quantity: MilliQuantity, discount: MinorUnits): MinorUnits {
    return extendAmount(unitPrice, quantity) - discount;
}

// ============================================
// FORMATTING
// ============================================

function formatScaled(value: number, digits: number): string {
    const sign = value < 0 ? '-' : '';
    const abs = Math.abs(value);
    const scale = 10 ** digits;
    const whole = Math.floor(abs / scale);
    const fraction = String(abs % scale).padStart(digits, '0');
    return `${sign}${whole}.${fraction}`;
}

/**
 * Render minor units as a fixed 2-decimal string.
 *
 * @example
 * formatMinor(1250) // '12.50'
 * formatMinor(-5)   // '-0.05'
 */
export function formatMinor(amount: MinorUnits): string {
    return formatScaled(amount, 2);
}

/**
 * Render a thousandths quantity as a fixed 3-decimal string.
 *
 * @example
 * formatQuantity(2000) // '2.000'
 */
export function formatQuantity(quantity: MilliQuantity): string {
    return formatScaled(quantity, 3);
}

/**
 * Parse a fixed-point decimal string back to minor units.
 * Used when re-reading staged export files.
 */
export function parseMinor(value: string): MinorUnits {
    const match = /^(-)?(\d+)(?:\.(\d{1,2}))?$/.exec(value.trim());
    if (!match) {
        throw new RangeError(`Not a 2-decimal amount: '${value}'`);
    }
    const [, sign, whole, fraction = ''] = match;
    const minor = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
    return sign ? -minor : minor;
}
