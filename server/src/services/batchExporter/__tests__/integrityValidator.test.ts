/**
 * Tests for staged package validation
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { checkReferentialIntegrity, validateStagedPackage } from '../integrityValidator.js';
import { writeStagedPackage } from '../packageWriter.js';
import type { EntityRows, ExportPackage } from '../types.js';

function validRows(): EntityRows {
    return {
        TransactionHeaders: [{ TransactionId: 'UE-1', Total: '10.00' }],
        SalesLines: [
            { TransactionId: 'UE-1', LineNumber: '1' },
            { TransactionId: 'UE-1', LineNumber: '2' },
        ],
        PaymentLines: [
            { TransactionId: 'UE-1', Amount: '7.50' },
            { TransactionId: 'UE-1', Amount: '2.50' },
        ],
        TaxLines: [
            { TransactionId: 'UE-1', LineNumber: '1' },
            { TransactionId: 'UE-1', LineNumber: '2' },
        ],
    };
}

describe('checkReferentialIntegrity', () => {
    it('accepts consistent rows', () => {
        expect(checkReferentialIntegrity(validRows())).toEqual([]);
    });

    it('reports duplicate headers', () => {
        const rows = validRows();
        rows.TransactionHeaders.push({ TransactionId: 'UE-1', Total: '10.00' });

        expect(checkReferentialIntegrity(rows)).toContain('Duplicate transaction header UE-1');
    });

    it('reports a header with no payment rows', () => {
        const rows = validRows();
        rows.PaymentLines = [];

        expect(checkReferentialIntegrity(rows)).toEqual(['Transaction UE-1 has no PaymentLines rows']);
    });

    it('reports a tax line without a matching sales line', () => {
        const rows = validRows();
        rows.TaxLines.push({ TransactionId: 'UE-1', LineNumber: '3' });

        expect(checkReferentialIntegrity(rows)).toEqual(['Tax line UE-1#3 has no matching sales line']);
    });

    it('reports payments that do not sum to the header total', () => {
        const rows = validRows();
        rows.PaymentLines = [{ TransactionId: 'UE-1', Amount: '9.99' }];

        expect(checkReferentialIntegrity(rows)).toEqual(['Transaction UE-1 payments sum to 9.99, header total is 10.00']);
    });
});

describe('validateStagedPackage', () => {
    let dir: string;

    const pkg: ExportPackage = {
        rows: validRows(),
        keys: [{ channel: 'uber_eats', sourceOrderId: '1' }],
        excluded: [],
    };

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'order-bridge-validate-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('accepts a package as written', async () => {
        await writeStagedPackage(dir, pkg, { batchId: 'b-1', createdAt: '2026-03-14T13:00:00.000Z' });

        expect(await validateStagedPackage(dir, 'b-1')).toEqual([]);
    });

    it('reports a batch id mismatch', async () => {
        await writeStagedPackage(dir, pkg, { batchId: 'b-1', createdAt: '2026-03-14T13:00:00.000Z' });

        expect(await validateStagedPackage(dir, 'b-2')).toEqual(['Manifest batch id b-1 does not match b-2']);
    });

    it('reports a file altered after the manifest was written', async () => {
        await writeStagedPackage(dir, pkg, { batchId: 'b-1', createdAt: '2026-03-14T13:00:00.000Z' });
        const filePath = path.join(dir, 'PaymentLines.csv');
        await writeFile(filePath, `${await readFile(filePath, 'utf8')}\nUE-1,,,1.00,`, 'utf8');

        const violations = await validateStagedPackage(dir, 'b-1');

        expect(violations).toContain('PaymentLines.csv does not match its manifest checksum');
        expect(violations).toContain('PaymentLines.csv has 3 rows, manifest says 2');
    });

    it('reports a missing manifest', async () => {
        const violations = await validateStagedPackage(dir, 'b-1');

        expect(violations).toHaveLength(1);
        expect(violations[0]).toMatch(/^Manifest unreadable: /);
    });
});
