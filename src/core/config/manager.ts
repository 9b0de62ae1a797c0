/**
 * Settings manager: Locate, load, save, validate, and merge settings.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, documents/codec.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands
 */

import { isAbsolute, join, resolve } from 'node:path';
import { settingsSchema } from './schema.js';
import { DEFAULT_SETTINGS, DREAM_ROOT_ENV, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME } from './defaults.js';
import type { Settings, SettingsInput } from './types.js';
import { jsonCodec } from '../documents/codec.js';
import { ensureDir, fileExists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Resolve the settings directory path for a given Dream root.
 */
export function getSettingsDir(dreamRoot: string): string {
    return join(resolve(dreamRoot), SETTINGS_DIR_NAME);
}

/**
 * Resolve the full settings file path for a given Dream root.
 */
export function getSettingsPath(dreamRoot: string): string {
    return join(getSettingsDir(dreamRoot), SETTINGS_FILE_NAME);
}

/**
 * Check whether a settings file exists in the given Dream root.
 */
export function settingsExist(dreamRoot: string): boolean {
    return fileExists(getSettingsPath(dreamRoot));
}

/**
 * Validate raw settings, applying defaults.
 * @throws {ConfigError} listing every failing field
 */
export function validateSettings(raw: unknown, source: string): Settings {
    const result = settingsSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(
            (i) => `  - ${i.path.join('.')}: ${i.message}`,
        ).join('\n');

        throw new ConfigError(
            `Invalid settings in ${source}:\n${issues}`,
            { source, issues: result.error.issues },
        );
    }

    return result.data;
}

/**
 * Load settings from disk. A Dream root without a settings file gets the defaults.
 *
 * @throws {ParseError} if the file is not valid JSON
 * @throws {ConfigError} if the file fails validation
 */
export function loadSettings(dreamRoot: string): Settings {
    const settingsPath = getSettingsPath(dreamRoot);

    if (!fileExists(settingsPath)) {
        logger.debug(`No settings at ${settingsPath}, using defaults`);
        return getDefaultSettings();
    }

    logger.debug(`Loading settings from ${settingsPath}`);
    const raw = jsonCodec.decode(readTextFile(settingsPath), settingsPath);
    return validateSettings(raw, settingsPath);
}

/**
 * Save settings to disk, validating before write.
 *
 * @returns the settings file path
 * @throws {ConfigError} if validation fails
 */
export function saveSettings(dreamRoot: string, settings: SettingsInput): string {
    const validated = validateSettings(settings, 'settings to save');
    const settingsPath = getSettingsPath(dreamRoot);

    ensureDir(getSettingsDir(dreamRoot));
    writeTextFile(settingsPath, jsonCodec.encode(validated), true);
    logger.debug(`Settings saved to ${settingsPath}`);
    return settingsPath;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = deepMerge(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Merge partial overrides into complete settings and re-validate.
 */
export function mergeSettings(target: Settings, overrides: SettingsInput): Settings {
    return validateSettings(deepMerge(target, overrides), 'merged settings');
}

/**
 * Get the default settings with optional partial overrides merged in.
 */
export function getDefaultSettings(overrides?: SettingsInput): Settings {
    const defaults = structuredClone(DEFAULT_SETTINGS);
    if (!overrides) return defaults;
    return mergeSettings(defaults, overrides);
}

/**
 * Pick the Dream root: explicit option, then $DREAM_ROOT_DIR, then the working directory.
 */
export function resolveDreamRoot(option?: string, env: NodeJS.ProcessEnv = process.env): string {
    const fromEnv = env[DREAM_ROOT_ENV];
    if (option) return resolve(option);
    if (fromEnv) return resolve(fromEnv);
    return process.cwd();
}

/**
 * Absolute path of the configured dff skill template, if one is configured.
 */
export function resolveDffTemplate(dreamRoot: string, settings: Settings): string | undefined {
    const configured = settings.templates.dffSkill;
    if (!configured) return undefined;
    return isAbsolute(configured) ? configured : resolve(dreamRoot, configured);
}
