/**
 * Centralized Environment Variable Validation
 *
 * Validates ALL environment variables at startup using Zod.
 * If validation fails, the process exits with one line per failing variable.
 *
 * USAGE:
 * - Only the composition root (src/index.ts) imports `env`
 * - Services receive their settings through constructor options so tests
 *   never need a populated environment
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 * 3. Thread it through buildPipelineConfig() if a service needs it
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// HELPERS
// ============================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

/** Comma-separated list → trimmed, non-empty entries */
const csvList = z
    .string()
    .default('')
    .transform(value => value.split(',').map(part => part.trim()).filter(part => part.length > 0));

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z
    .object({
        // ----------------------------------------
        // REQUIRED - App will not start without these
        // ----------------------------------------

        /** Shared secret the marketplace signs webhook bodies with */
        MARKETPLACE_WEBHOOK_SECRET: z.string().min(1, 'MARKETPLACE_WEBHOOK_SECRET is required'),

        /** Bearer token for the marketplace API (static token provider) */
        MARKETPLACE_ACCESS_TOKEN: z.string().min(1, 'MARKETPLACE_ACCESS_TOKEN is required'),

        /** Bearer token operators present to /api/pipeline */
        ADMIN_API_TOKEN: z.string().min(1, 'ADMIN_API_TOKEN is required'),

        // ----------------------------------------
        // OPTIONAL - With sensible defaults
        // ----------------------------------------

        /** Environment mode */
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

        /** Server port */
        PORT: z.coerce.number().default(3001),

        /** Log level override (pino level name) */
        LOG_LEVEL: z.string().optional(),

        /** Where the ledger and orders live: Postgres, or process memory for local runs */
        STORE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),

        /** PostgreSQL connection string (required when STORE_BACKEND=postgres) */
        DATABASE_URL: z.string().optional(),

        /** Disable reconcile/export timers (queue and webhook stay up) */
        DISABLE_BACKGROUND_WORKERS: z.enum(['true', 'false']).default('false'),

        // ----------------------------------------
        // MARKETPLACE
        // ----------------------------------------

        /** Marketplace API base URL */
        MARKETPLACE_API_BASE_URL: z.string().url().default('https://api.marketplace.example'),

        /** Channel identifier recorded on every order */
        MARKETPLACE_CHANNEL: z.string().min(1).default('uber_eats'),

        /** Stores swept by the safety-net reconciler */
        MARKETPLACE_STORE_IDS: csvList,

        /** Per-request timeout for marketplace calls */
        MARKETPLACE_TIMEOUT_MS: positiveInt(10_000),

        // ----------------------------------------
        // PIPELINE TUNABLES
        // ----------------------------------------

        WEBHOOK_ACK_DEADLINE_MS: positiveInt(5000),
        RECONCILE_INTERVAL_MINUTES: positiveInt(15),
        RECONCILE_LOOKBACK_HOURS: positiveInt(24),
        RECONCILE_STORE_CONCURRENCY: positiveInt(3),
        STRANDED_AFTER_MINUTES: positiveInt(30),
        FETCH_MAX_ATTEMPTS: positiveInt(4),
        FETCH_BASE_DELAY_MS: positiveInt(500),
        QUEUE_CONCURRENCY: positiveInt(8),
        QUEUE_MAX_DEPTH: positiveInt(10_000),
        PERSIST_MAX_ATTEMPTS: positiveInt(3),
        PERSIST_RETRY_DELAY_MS: positiveInt(30_000),
        EXPORT_INTERVAL_MINUTES: positiveInt(30),
        EXPORT_BATCH_SIZE: positiveInt(500),

        /** Root directory for staged and promoted ERP packages */
        EXPORT_ROOT_DIR: z.string().min(1).default('./exports'),

        /** Path to the kit definitions file (defaults to server/config/kits.json) */
        KIT_DEFINITIONS_PATH: z.string().optional(),
    })
    .superRefine((value, ctx) => {
        if (value.STORE_BACKEND === 'postgres' && !value.DATABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['DATABASE_URL'],
                message: 'DATABASE_URL is required when STORE_BACKEND=postgres',
            });
        }
    });

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

function parseEnv(): Env {
    try {
        return envSchema.parse(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => {
                const path = issue.path.join('.');
                return `  - ${path}: ${issue.message}`;
            }).join('\n');

            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}

export const env = parseEnv();
