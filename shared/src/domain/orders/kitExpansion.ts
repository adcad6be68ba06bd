/**
 * Kit Expansion - Pure Domain Logic
 *
 * Replaces an ordered kit SKU with a retained parent line plus one line per
 * component SKU.
 *
 * PRICING RULE:
 * - Every component is priced at the minimal unit price (0.01), discount 0.00, tax 0.00
 * - The parent keeps the original quantity, the ENTIRE original discount and tax,
 *   and unit price = original unit price − (component count × 0.01)
 * - If the original unit price cannot cover the component floor prices,
 *   components are priced 0.00 and the parent keeps the full price
 *
 * For integer quantities this reconciles exactly:
 *   parent total + Σ component totals = original line total
 *
 * ORDERING:
 * The parent stays at the original position, its components follow it in
 * kit-definition order, and every line is renumbered 1..n afterwards.
 *
 * @module domain/orders/kitExpansion
 */

import { MINIMAL_UNIT_PRICE, computeLineTotal, type MinorUnits } from './money.js';
import type { KitDefinition, OrderLine } from './types.js';

// ============================================
// TYPES
// ============================================

export type KitLookup = ReadonlyMap<string, KitDefinition>;

export interface KitExpansionResult {
    lines: OrderLine[];
    /** Number of kit lines that were expanded */
    expandedKits: number;
}

// ============================================
// HELPERS
// ============================================

export function buildKitLookup(definitions: readonly KitDefinition[]): KitLookup {
    return new Map(definitions.map(def => [def.parentProductId, def]));
}

/**
 * Floor price per component given the kit's unit price.
 */
export function componentUnitPrice(parentUnitPrice: MinorUnits, componentCount: number): MinorUnits {
    return parentUnitPrice >= componentCount * MINIMAL_UNIT_PRICE ? MINIMAL_UNIT_PRICE : 0;
}

/**
 * Renumber lines 1..n in their current order.
 */
export function resequenceLines(lines: readonly OrderLine[]): OrderLine[] {
    return lines.map((line, index) => ({ ...line, lineNumber: index + 1 }));
}

/**
 * Expand a single kit line. Line numbers on the result are provisional.
 */
export function expandKitLine(line: OrderLine, kit: KitDefinition): OrderLine[] {
    const componentCount = kit.componentProductIds.length;
    const componentPrice = componentUnitPrice(line.unitPrice, componentCount);
    const parentUnitPrice = line.unitPrice - componentCount * componentPrice;

    const parent: OrderLine = {
        ...line,
        unitPrice: parentUnitPrice,
        lineTotal: computeLineTotal(parentUnitPrice, line.quantity, line.discount),
        kitRole: 'parent',
        kitParentProductId: null,
    };

    const components: OrderLine[] = kit.componentProductIds.map((componentId, index) => ({
        lineNumber: line.lineNumber + index + 1,
        productId: componentId,
        description: `${line.description} / ${componentId}`,
        quantity: line.quantity,
        unitPrice: componentPrice,
        discount: 0,
        tax: 0,
        lineTotal: computeLineTotal(componentPrice, line.quantity, 0),
        isServiceCharge: false,
        kitRole: 'component',
        kitParentProductId: line.productId,
    }));

    return [parent, ...components];
}

// ============================================
// MAIN
// ============================================

/**
 * Expand every kit line in an order and resequence.
 * Service-charge lines are never treated as kits.
 */
export function expandKits(lines: readonly OrderLine[], kits: KitLookup): KitExpansionResult {
    const expanded: OrderLine[] = [];
    let expandedKits = 0;

    for (const line of lines) {
        const kit = line.isServiceCharge ? undefined : kits.get(line.productId);
        if (!kit) {
            expanded.push(line);
            continue;
        }
        expanded.push(...expandKitLine(line, kit));
        expandedKits++;
    }

    return { lines: resequenceLines(expanded), expandedKits };
}
