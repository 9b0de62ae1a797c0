/**
 * Per-command context: Dream root, settings, and log level.
 *
 * Dependency direction: context.ts → commander, config manager, dream-root.ts, logger
 * Used by: every CLI command
 */

import type { Command } from 'commander';
import { loadSettings, resolveDreamRoot } from '../../core/config/manager.js';
import type { Settings } from '../../core/config/types.js';
import { assertDreamRoot } from '../../core/dream-root.js';
import { LOG_LEVEL_NAMES, LogLevel, setLogLevel } from '../../utils/logger.js';

/** Options registered on the root program. */
export interface GlobalOptions {
    dream?: string;
    verbose?: boolean;
    quiet?: boolean;
}

export interface CliContext {
    dreamRoot: string;
    settings: Settings;
}

/**
 * Resolve the Dream root, load its settings and apply the log level.
 *
 * @throws {NotADirectoryError} if `requireDreamRoot` and the root is not a Dream checkout
 */
export function loadCliContext(command: Command, requireDreamRoot: boolean = true): CliContext {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const dreamRoot = resolveDreamRoot(globals.dream);
    const settings = loadSettings(dreamRoot);

    if (globals.verbose) {
        setLogLevel(LogLevel.Debug);
    } else if (globals.quiet) {
        setLogLevel(LogLevel.Error);
    } else {
        setLogLevel(LOG_LEVEL_NAMES[settings.logLevel]);
    }

    if (requireDreamRoot) {
        assertDreamRoot(dreamRoot);
    }

    return { dreamRoot, settings };
}
