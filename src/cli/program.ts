/**
 * Root command: global options and every subcommand.
 *
 * Dependency direction: program.ts → commander, all command files
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { newCommand } from './commands/new.js';
import { listCommand } from './commands/list.js';
import { showCommand } from './commands/show.js';
import { configCommand } from './commands/config.js';

export function createProgram(): Command {
    const program = new Command();

    program
        .name('dreamtools')
        .description('Manage Dream distributions: scaffold dists and skills, derive local.yml')
        .version('0.1.0')
        .option('-D, --dream <path>', 'Dream root directory (default: $DREAM_ROOT_DIR or ./)')
        .option('--verbose', 'show debug output')
        .option('--quiet', 'only show errors');

    // Register commands
    program.addCommand(newCommand);
    program.addCommand(listCommand);
    program.addCommand(showCommand);
    program.addCommand(configCommand);

    return program;
}
