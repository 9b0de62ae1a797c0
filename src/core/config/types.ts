/**
 * TypeScript types inferred from the settings schemas.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that reads settings
 */

import { z } from 'zod';
import { localSettingsSchema, settingsSchema, templateSettingsSchema } from './schema.js';

/** Complete dreamtools settings. */
export type Settings = z.infer<typeof settingsSchema>;

/** Defaults for local.yml generation. */
export type LocalSettings = z.infer<typeof localSettingsSchema>;

/** Template directory overrides. */
export type TemplateSettings = z.infer<typeof templateSettingsSchema>;

/** Settings as written by hand: every field optional, defaults not yet applied. */
export type SettingsInput = z.input<typeof settingsSchema>;
