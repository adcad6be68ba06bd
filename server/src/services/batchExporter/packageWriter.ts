/**
 * Package Writer
 *
 * Writes the entity files and the manifest into a staging directory.
 * The manifest records each file's row count and SHA-256 so the validator
 * (and the ERP import job) can detect a truncated or altered file.
 */

import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { format } from 'fast-csv';
import { ENTITY_COLUMNS, EXPORT_FILE_NAMES } from './columnMaps.js';
import { EXPORT_ENTITIES, MANIFEST_FILE_NAME, type ExportPackage, type ExportRow, type Manifest } from './types.js';

export interface StagedPackageInfo {
    batchId: string;
    createdAt: string;
}

export type PackageWriter = (dir: string, pkg: ExportPackage, info: StagedPackageInfo) => Promise<Manifest>;

async function writeCsv(filePath: string, headers: readonly string[], rows: readonly ExportRow[]): Promise<void> {
    const csvStream = format<ExportRow, ExportRow>({ headers: [...headers], alwaysWriteHeaders: true });
    const done = pipeline(csvStream, createWriteStream(filePath));

    for (const row of rows) {
        csvStream.write(row);
    }
    csvStream.end();

    await done;
}

export async function sha256File(filePath: string): Promise<string> {
    return createHash('sha256').update(await readFile(filePath)).digest('hex');
}

export const writeStagedPackage: PackageWriter = async (dir, pkg, info) => {
    await mkdir(dir, { recursive: true });

    const files: Manifest['files'] = [];
    for (const entity of EXPORT_ENTITIES) {
        const fileName = EXPORT_FILE_NAMES[entity];
        const filePath = path.join(dir, fileName);
        const rows = pkg.rows[entity];

        await writeCsv(filePath, ENTITY_COLUMNS[entity], rows);
        files.push({ entity, fileName, rowCount: rows.length, sha256: await sha256File(filePath) });
    }

    const manifest: Manifest = {
        batchId: info.batchId,
        createdAt: info.createdAt,
        orderCount: pkg.keys.length,
        files,
    };
    await writeFile(path.join(dir, MANIFEST_FILE_NAME), `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
    return manifest;
};
