/**
 * Batch Export types
 *
 * A batch package is one directory holding four CSV entity files and a
 * manifest. The ERP import job consumes the directory as a single unit.
 */

import { z } from 'zod';
import type { OrderKey } from '@order-bridge/shared/domain';

export const EXPORT_ENTITIES = ['TransactionHeaders', 'SalesLines', 'PaymentLines', 'TaxLines'] as const;

export type ExportEntity = (typeof EXPORT_ENTITIES)[number];

/** One CSV row, keyed by column name */
export type ExportRow = Record<string, string>;

export type EntityRows = Record<ExportEntity, ExportRow[]>;

export interface ExcludedOrder extends OrderKey {
    reason: string;
}

export interface ExportPackage {
    rows: EntityRows;
    /** Orders whose rows are in the package */
    keys: OrderKey[];
    /** Persisted orders left out of this batch; they stay Persisted */
    excluded: ExcludedOrder[];
}

// ============================================
// MANIFEST
// ============================================

export const MANIFEST_FILE_NAME = 'manifest.json';

export const manifestFileSchema = z.object({
    entity: z.enum(EXPORT_ENTITIES),
    fileName: z.string().min(1),
    rowCount: z.number().int().nonnegative(),
    sha256: z.string().regex(/^[0-9a-f]{64}$/),
});

export const manifestSchema = z.object({
    batchId: z.string().min(1),
    createdAt: z.string(),
    orderCount: z.number().int().nonnegative(),
    files: z.array(manifestFileSchema),
});

export type ManifestFile = z.infer<typeof manifestFileSchema>;
export type Manifest = z.infer<typeof manifestSchema>;

// ============================================
// RUN RESULTS
// ============================================

export type ExportResult =
    | {
          outcome: 'exported';
          batchId: string;
          orderCount: number;
          rowCounts: Record<ExportEntity, number>;
          path: string;
          excluded: number;
      }
    | {
          outcome: 'rejected';
          batchId: string;
          orderCount: number;
          violations: string[];
      }
    | {
          outcome: 'skipped';
          skipped: 'locked' | 'empty';
      };
