/**
 * Dream root detection.
 *
 * Dependency direction: dream-root.ts → utils/fs.ts, errors.ts
 * Used by: CLI commands
 */

import { join, resolve } from 'node:path';
import { directoryExists } from '../utils/fs.js';
import { NotADirectoryError } from './errors.js';

/** Subdirectories every Dream root has. */
export const DREAM_SUBDIRS = ['assistant_dists', 'annotators', 'skills'] as const;

/**
 * Check whether `root` looks like a Dream checkout.
 */
export function isDreamRoot(root: string): boolean {
    return DREAM_SUBDIRS.every((subdir) => directoryExists(join(root, subdir)));
}

/**
 * @throws {NotADirectoryError} if `root` is not a Dream checkout
 */
export function assertDreamRoot(root: string): void {
    const absoluteRoot = resolve(root);
    if (isDreamRoot(absoluteRoot)) return;

    const missing = DREAM_SUBDIRS.filter((subdir) => !directoryExists(join(absoluteRoot, subdir)));
    throw new NotADirectoryError(
        `${absoluteRoot} is not a Dream directory (missing ${missing.join(', ')}).\n\n` +
            "Make sure you run 'dreamtools' from inside the Dream directory or provide -D/--dream, e.g.:\n" +
            'dreamtools -D ~/projects/dream <command>',
        { dreamRoot: absoluteRoot, missing },
    );
}
