/**
 * Zod schemas for the dreamtools settings file (`.dreamtools/config.json`).
 *
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, types.ts
 */

import { z } from 'zod';

/**
 * Defaults for `dreamtools new local`.
 */
export const localSettingsSchema = z.object({
    /** Remove published ports from services run from dev.yml. */
    dropPorts: z.boolean().default(true),
    /** Pin every service of local.yml to one replica. */
    singleReplica: z.boolean().default(true),
    /** Services always run locally alongside the selected ones. */
    infraServices: z.array(z.string().min(1)).default(['agent', 'mongo']),
});

/**
 * Template locations. Relative paths are resolved against the Dream root.
 */
export const templateSettingsSchema = z.object({
    /** Directory copied by `dreamtools new dff`. Defaults to the bundled template. */
    dffSkill: z.string().min(1).optional(),
});

/**
 * The complete settings schema.
 */
export const settingsSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    /** Console verbosity. */
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    local: localSettingsSchema.default({}),
    templates: templateSettingsSchema.default({}),
});
