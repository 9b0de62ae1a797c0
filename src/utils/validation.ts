/**
 * Validators for names that become directories under the Dream root.
 *
 * Dependency direction: validation.ts → zod, errors.ts
 * Used by: dist/distribution.ts, skills.ts
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../core/errors.js';

/**
 * A single path segment: starts with an alphanumeric character and holds
 * only alphanumerics, hyphens, underscores and dots.
 * Examples: "dream", "deepy_base", "my-skill.v2"
 */
export const directoryName = z
    .string()
    .trim()
    .min(1, 'Name cannot be empty')
    .regex(
        /^[a-zA-Z0-9][a-zA-Z0-9\-_.]*$/,
        'Name must start with alphanumeric and contain only alphanumeric, hyphens, underscores, or dots',
    );

/**
 * @returns the trimmed name
 * @throws {InvalidArgumentError} if `name` cannot be used as a directory name
 */
export function assertDirectoryName(label: string, name: string): string {
    const result = directoryName.safeParse(name);
    if (!result.success) {
        const reason = result.error.issues.map((i) => i.message).join('; ');
        throw new InvalidArgumentError(`Invalid ${label} name "${name}": ${reason}`, { label, name });
    }
    return result.data;
}
