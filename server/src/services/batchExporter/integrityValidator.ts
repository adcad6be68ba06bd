/**
 * Package Integrity Validator
 *
 * Re-reads a staged package from disk and checks it as the ERP import job
 * would see it.
 *
 * CHECKS:
 * 1. Manifest parses, names each entity once, matches the batch id
 * 2. Every listed file exists with the recorded SHA-256 and row count
 * 3. Header transaction ids are unique
 * 4. Every sales, payment and tax row references a header transaction id
 * 5. Every header id appears in the sales, payment and tax files
 * 6. Every tax row references a sales line of its transaction
 * 7. Per transaction, payment amounts sum to the header total
 *
 * Returns the list of violations; an empty list means the package is valid.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { formatMinor, parseMinor } from '@order-bridge/shared/domain';
import { TRANSACTION_ID_COLUMN } from './columnMaps.js';
import { sha256File } from './packageWriter.js';
import { EXPORT_ENTITIES, MANIFEST_FILE_NAME, manifestSchema, type EntityRows, type ExportRow, type Manifest } from './types.js';

const csvRowsSchema = z.array(z.record(z.string()));

function readCsv(content: string): ExportRow[] {
    const records: unknown = parse(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
    });
    return csvRowsSchema.parse(records);
}

function column(row: ExportRow, name: string): string {
    return row[name] ?? '';
}

function safeParseMinor(value: string): number | null {
    try {
        return parseMinor(value);
    } catch {
        return null;
    }
}

async function loadManifest(dir: string, violations: string[]): Promise<Manifest | null> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path.join(dir, MANIFEST_FILE_NAME), 'utf8'));
    } catch (error) {
        violations.push(`Manifest unreadable: ${error instanceof Error ? error.message : String(error)}`);
        return null;
    }

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
        violations.push(`Manifest invalid: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`);
        return null;
    }
    return parsed.data;
}

/**
 * Load every entity file named in the manifest, checking hash and row count
 */
async function loadEntityRows(dir: string, manifest: Manifest, violations: string[]): Promise<EntityRows | null> {
    const rows: EntityRows = { TransactionHeaders: [], SalesLines: [], PaymentLines: [], TaxLines: [] };

    for (const entity of EXPORT_ENTITIES) {
        const entries = manifest.files.filter(f => f.entity === entity);
        if (entries.length !== 1) {
            violations.push(`Manifest lists ${entity} ${entries.length} times`);
            continue;
        }

        const [entry] = entries;
        if (!entry) continue;
        const filePath = path.join(dir, entry.fileName);

        let content: string;
        try {
            content = await readFile(filePath, 'utf8');
        } catch {
            violations.push(`${entry.fileName} is missing`);
            continue;
        }

        if ((await sha256File(filePath)) !== entry.sha256) {
            violations.push(`${entry.fileName} does not match its manifest checksum`);
        }

        try {
            rows[entity] = readCsv(content);
        } catch (error) {
            violations.push(`${entry.fileName} could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
            continue;
        }

        if (rows[entity].length !== entry.rowCount) {
            violations.push(`${entry.fileName} has ${rows[entity].length} rows, manifest says ${entry.rowCount}`);
        }
    }

    return violations.length > 0 ? null : rows;
}

/**
 * Cross-file referential checks on parsed rows
 */
export function checkReferentialIntegrity(rows: EntityRows): string[] {
    const violations: string[] = [];
    const headerTotals = new Map<string, string>();

    for (const header of rows.TransactionHeaders) {
        const id = column(header, TRANSACTION_ID_COLUMN);
        if (headerTotals.has(id)) {
            violations.push(`Duplicate transaction header ${id}`);
        }
        headerTotals.set(id, column(header, 'Total'));
    }

    const referenced = {
        SalesLines: new Set<string>(),
        PaymentLines: new Set<string>(),
        TaxLines: new Set<string>(),
    };

    for (const entity of ['SalesLines', 'PaymentLines', 'TaxLines'] as const) {
        for (const row of rows[entity]) {
            const id = column(row, TRANSACTION_ID_COLUMN);
            referenced[entity].add(id);
            if (!headerTotals.has(id)) {
                violations.push(`${entity} references unknown transaction ${id}`);
            }
        }
    }

    for (const id of headerTotals.keys()) {
        for (const entity of ['SalesLines', 'PaymentLines', 'TaxLines'] as const) {
            if (!referenced[entity].has(id)) {
                violations.push(`Transaction ${id} has no ${entity} rows`);
            }
        }
    }

    const salesLineKeys = new Set(
        rows.SalesLines.map(row => `${column(row, TRANSACTION_ID_COLUMN)}#${column(row, 'LineNumber')}`)
    );
    for (const row of rows.TaxLines) {
        const key = `${column(row, TRANSACTION_ID_COLUMN)}#${column(row, 'LineNumber')}`;
        if (headerTotals.has(column(row, TRANSACTION_ID_COLUMN)) && !salesLineKeys.has(key)) {
            violations.push(`Tax line ${key} has no matching sales line`);
        }
    }

    const paymentSums = new Map<string, number>();
    for (const row of rows.PaymentLines) {
        const id = column(row, TRANSACTION_ID_COLUMN);
        const amount = safeParseMinor(column(row, 'Amount'));
        if (amount === null) {
            violations.push(`Payment line of ${id} has invalid amount '${column(row, 'Amount')}'`);
            continue;
        }
        paymentSums.set(id, (paymentSums.get(id) ?? 0) + amount);
    }

    for (const [id, totalText] of headerTotals) {
        const total = safeParseMinor(totalText);
        const paid = paymentSums.get(id);
        if (total === null) {
            violations.push(`Transaction ${id} has invalid total '${totalText}'`);
        } else if (paid !== undefined && paid !== total) {
            violations.push(`Transaction ${id} payments sum to ${formatMinor(paid)}, header total is ${formatMinor(total)}`);
        }
    }

    return violations;
}

export async function validateStagedPackage(dir: string, expectedBatchId: string): Promise<string[]> {
    const violations: string[] = [];

    const manifest = await loadManifest(dir, violations);
    if (!manifest) return violations;

    if (manifest.batchId !== expectedBatchId) {
        violations.push(`Manifest batch id ${manifest.batchId} does not match ${expectedBatchId}`);
    }

    const rows = await loadEntityRows(dir, manifest, violations);
    if (!rows) return violations;

    violations.push(...checkReferentialIntegrity(rows));

    if (rows.TransactionHeaders.length !== manifest.orderCount) {
        violations.push(`Manifest order count ${manifest.orderCount} does not match ${rows.TransactionHeaders.length} headers`);
    }

    return violations;
}
