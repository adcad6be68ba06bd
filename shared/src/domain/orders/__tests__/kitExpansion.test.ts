/**
 * Unit tests for kit expansion
 */

import { buildKitLookup, componentUnitPrice, expandKits } from '../kitExpansion.js';
import { computeLineTotal } from '../money.js';
import type { OrderLine } from '../types.js';

function line(lineNumber: number, productId: string, overrides: Partial<OrderLine> = {}): OrderLine {
    const base: OrderLine = {
        lineNumber,
        productId,
        description: productId,
        quantity: 1000,
        unitPrice: 500,
        discount: 0,
        tax: 0,
        lineTotal: 500,
        isServiceCharge: false,
        kitRole: 'none',
        kitParentProductId: null,
    };
    const merged = { ...base, ...overrides };
    return { ...merged, lineTotal: computeLineTotal(merged.unitPrice, merged.quantity, merged.discount) };
}

const kits = buildKitLookup([
    { parentProductId: 'KIT-BREAKFAST', componentProductIds: ['EGG', 'TOAST', 'JUICE'] },
]);

describe('expandKits', () => {
    const kitLine = line(2, 'KIT-BREAKFAST', { unitPrice: 1000, discount: 100, tax: 80 });
    const { lines, expandedKits } = expandKits([line(1, 'COFFEE'), kitLine, line(3, 'MUFFIN')], kits);

    it('keeps the parent at the original position followed by its components', () => {
        expect(lines.map(l => [l.lineNumber, l.productId, l.kitRole])).toEqual([
            [1, 'COFFEE', 'none'],
            [2, 'KIT-BREAKFAST', 'parent'],
            [3, 'EGG', 'component'],
            [4, 'TOAST', 'component'],
            [5, 'JUICE', 'component'],
            [6, 'MUFFIN', 'none'],
        ]);
        expect(expandedKits).toBe(1);
    });

    it('prices each component at 0.01 with no discount or tax', () => {
        const components = lines.filter(l => l.kitRole === 'component');
        expect(components).toHaveLength(3);
        for (const component of components) {
            expect(component.unitPrice).toBe(1);
            expect(component.discount).toBe(0);
            expect(component.tax).toBe(0);
            expect(component.lineTotal).toBe(1);
            expect(component.kitParentProductId).toBe('KIT-BREAKFAST');
        }
    });

    it('assigns the residual price and the whole discount to the parent', () => {
        const parent = lines[1];
        expect(parent?.unitPrice).toBe(997);
        expect(parent?.discount).toBe(100);
        expect(parent?.tax).toBe(80);
        expect(parent?.lineTotal).toBe(897);
    });

    it('reconciles with the original line total', () => {
        const kitTotal = lines
            .filter(l => l.productId === 'KIT-BREAKFAST' || l.kitParentProductId === 'KIT-BREAKFAST')
            .reduce((sum, l) => sum + l.lineTotal, 0);
        expect(kitTotal).toBe(kitLine.lineTotal);
    });

    it('keeps the line-total invariant on every line', () => {
        for (const l of lines) {
            expect(l.lineTotal).toBe(computeLineTotal(l.unitPrice, l.quantity, l.discount));
        }
    });

    it('carries the quantity onto components', () => {
        const result = expandKits([line(1, 'KIT-BREAKFAST', { quantity: 2000, unitPrice: 1000, discount: 100 })], kits);
        expect(result.lines.map(l => l.lineTotal)).toEqual([1894, 2, 2, 2]);
        expect(result.lines.reduce((sum, l) => sum + l.lineTotal, 0)).toBe(1900);
    });

    it('never produces a negative-priced parent', () => {
        const result = expandKits([line(1, 'KIT-BREAKFAST', { unitPrice: 2 })], kits);
        expect(result.lines.map(l => l.unitPrice)).toEqual([2, 0, 0, 0]);
    });

    it('ignores service-charge lines carrying a kit product id', () => {
        const result = expandKits([line(1, 'KIT-BREAKFAST', { isServiceCharge: true })], kits);
        expect(result.lines).toHaveLength(1);
        expect(result.expandedKits).toBe(0);
    });
});

describe('componentUnitPrice', () => {
    it('uses the floor price when the kit can cover it', () => {
        expect(componentUnitPrice(3, 3)).toBe(1);
    });

    it('drops to zero when it cannot', () => {
        expect(componentUnitPrice(2, 3)).toBe(0);
    });
});
