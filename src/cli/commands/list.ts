/**
 * `dreamtools list`: Show the distributions of the Dream root.
 *
 * Dependency direction: list.ts → commander, dist module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import { listDistributions } from '../../core/dist/distribution.js';
import { logger } from '../../utils/logger.js';
import { loadCliContext } from '../utils/context.js';

export const listCommand = new Command('list')
    .description('List distributions in ./assistant_dists')
    .action((_options: unknown, command: Command) => {
        const { dreamRoot } = loadCliContext(command);
        const names = listDistributions(dreamRoot);

        logger.header(`Distributions (${names.length})`);
        for (const name of names) {
            logger.item(name);
        }
    });
