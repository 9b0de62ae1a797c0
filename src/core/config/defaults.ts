/**
 * Default settings and well-known names.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, dist/distribution.ts, CLI
 */

import type { Settings } from './types.js';

/** Services every local.yml runs from dev.yml, whatever else is selected. */
export const DEFAULT_INFRA_SERVICES: readonly string[] = ['agent', 'mongo'];

export const DEFAULT_SETTINGS: Settings = {
    version: 1,
    logLevel: 'info',
    local: {
        dropPorts: true,
        singleReplica: true,
        infraServices: [...DEFAULT_INFRA_SERVICES],
    },
    templates: {},
};

/** The directory name where settings are stored inside a Dream root. */
export const SETTINGS_DIR_NAME = '.dreamtools';

/** The settings file name. */
export const SETTINGS_FILE_NAME = 'config.json';

/** Environment variable naming the Dream root when -D/--dream is not given. */
export const DREAM_ROOT_ENV = 'DREAM_ROOT_DIR';
