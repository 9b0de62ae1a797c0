/**
 * Skill scaffolding from a template directory.
 *
 * Dependency direction: skills.ts → utils/fs.ts, utils/validation.ts
 * Used by: dist/distribution.ts
 */

import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { copyDirectory } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { assertDirectoryName } from '../utils/validation.js';

/** The dff skill template shipped with the package. */
export const BUNDLED_DFF_TEMPLATE = fileURLToPath(new URL('../../templates/dff_template_skill', import.meta.url));

/**
 * Where a skill called `name` lives.
 * @throws {InvalidArgumentError} if `name` is not a plain directory name
 */
export function resolveSkillPath(dreamRoot: string, name: string): string {
    return join(resolve(dreamRoot), 'skills', assertDirectoryName('skill', name));
}

/**
 * Copy the dff skill template to `dreamRoot/skills/name`.
 *
 * @returns the new skill directory
 * @throws {AlreadyExistsError} if the skill directory exists
 */
export function addDffSkill(dreamRoot: string, name: string, templateDir: string = BUNDLED_DFF_TEMPLATE): string {
    const skillDir = resolveSkillPath(dreamRoot, name);
    copyDirectory(templateDir, skillDir);
    logger.debug(`Copied ${templateDir} to ${skillDir}`);
    return skillDir;
}
