/**
 * Reference data schemas (kit definitions).
 *
 * Kit definitions are maintained outside the pipeline and loaded read-only.
 */

import { z } from 'zod';

export const kitDefinitionSchema = z.object({
    parentProductId: z.string().min(1),
    componentProductIds: z.array(z.string().min(1)).min(1),
});

export const kitDefinitionsFileSchema = z
    .object({
        kits: z.array(kitDefinitionSchema),
    })
    .superRefine((file, ctx) => {
        const seen = new Set<string>();
        file.kits.forEach((kit, index) => {
            if (seen.has(kit.parentProductId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['kits', index, 'parentProductId'],
                    message: `Duplicate kit definition for '${kit.parentProductId}'`,
                });
            }
            seen.add(kit.parentProductId);
        });
    });

export type KitDefinitionsFile = z.infer<typeof kitDefinitionsFileSchema>;
