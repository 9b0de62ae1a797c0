/**
 * `dreamtools config`: View the effective settings.
 *
 * Dependency direction: config.ts → commander, chalk, config module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getSettingsPath, settingsExist } from '../../core/config/manager.js';
import { logger } from '../../utils/logger.js';
import { loadCliContext } from '../utils/context.js';

export const configCommand = new Command('config')
    .description('View the dreamtools settings for the Dream root')
    .option('-p, --path', 'Show settings file path only')
    .action((options: { path?: boolean }, command: Command) => {
        const { dreamRoot, settings } = loadCliContext(command, false);
        const settingsPath = getSettingsPath(dreamRoot);

        if (options.path) {
            console.log(settingsPath);
            return;
        }

        logger.header('Current Settings');
        console.log(chalk.gray(settingsExist(dreamRoot) ? `File: ${settingsPath}` : 'No settings file, showing defaults'));
        console.log();
        console.log(JSON.stringify(settings, null, 2));
    });
