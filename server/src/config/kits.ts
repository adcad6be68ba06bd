/**
 * Kit Definitions Loader
 *
 * Reads the kit reference data (parent SKU → ordered component SKUs) from
 * server/config/kits.json and validates it before the pipeline starts.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { kitDefinitionsFileSchema } from '@order-bridge/shared/schemas';
import type { KitDefinition } from '@order-bridge/shared/domain';

export const DEFAULT_KIT_DEFINITIONS_PATH = fileURLToPath(new URL('../../config/kits.json', import.meta.url));

/**
 * @throws ZodError when the file does not match the schema
 */
export function loadKitDefinitions(path: string = DEFAULT_KIT_DEFINITIONS_PATH): KitDefinition[] {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
    return kitDefinitionsFileSchema.parse(raw).kits;
}
