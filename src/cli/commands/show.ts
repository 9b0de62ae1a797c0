/**
 * `dreamtools show`: Summarize the config files of one distribution.
 *
 * Dependency direction: show.ts → commander, chalk, dist module, documents
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DreamDist, existingConfigFlags } from '../../core/dist/distribution.js';
import { ComposeConfig } from '../../core/documents/compose.js';
import { logger } from '../../utils/logger.js';
import { loadCliContext } from '../utils/context.js';

export const showCommand = new Command('show')
    .description('Show the services defined by a distribution')
    .argument('<name>', 'Dream distribution name')
    .action((name: string, _options: unknown, command: Command) => {
        const { dreamRoot } = loadCliContext(command);
        const distPath = DreamDist.resolveDistPath(name, dreamRoot);
        const dist = DreamDist.fromName(name, dreamRoot, existingConfigFlags(distPath));

        logger.header(`${dist.name} ${chalk.gray(`(${dist.distPath})`)}`);

        for (const config of dist.iterConfigs()) {
            logger.blank();
            logger.info(config.kind.defaultFileName);

            if (config instanceof ComposeConfig) {
                for (const service of config.serviceNames()) {
                    logger.item(service);
                }
                continue;
            }

            for (const service of Object.keys(config.flattenedServices())) {
                const { host, port } = config.discoverHostPortEndpoint(service);
                const target = host ? chalk.gray(` → ${host}${port ? `:${port}` : ''}`) : '';
                logger.item(`${service}${target}`);
            }
        }
    });
