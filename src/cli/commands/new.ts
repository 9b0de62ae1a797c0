/**
 * `dreamtools new`: Create distributions, skills, and local.yml.
 *
 * Dependency direction: new.ts → commander, prompts, ora, chalk, dist module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { DreamDist, type LoadFlags } from '../../core/dist/distribution.js';
import { resolveDffTemplate } from '../../core/config/manager.js';
import { directoryExists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { loadCliContext } from '../utils/context.js';

interface NewDistOptions {
    dist: string;
    services?: string[];
    overwrite?: boolean;
    yes?: boolean;
    all?: boolean;
    pipeline?: boolean;
    composeOverride?: boolean;
    composeDev?: boolean;
    composeProxy?: boolean;
    composeLocal?: boolean;
}

interface NewLocalOptions {
    dist: string;
    services?: string[];
    dropPorts?: boolean;
    singleReplica?: boolean;
    overwrite?: boolean;
}

function selectedFlags(options: NewDistOptions): LoadFlags {
    if (options.all) {
        return { pipelineConf: true, composeOverride: true, composeDev: true, composeProxy: true, composeLocal: true };
    }
    return {
        pipelineConf: options.pipeline ?? false,
        composeOverride: options.composeOverride ?? false,
        composeDev: options.composeDev ?? false,
        composeProxy: options.composeProxy ?? false,
        composeLocal: options.composeLocal ?? false,
    };
}

const newDistCommand = new Command('dist')
    .description('Create a new distribution in ./assistant_dists from an existing one')
    .argument('<name>', 'new distribution name')
    .requiredOption('-d, --dist <template>', 'distribution to copy configs from')
    .option('-s, --services <names...>', 'keep only these services')
    .option('--overwrite', 'overwrite an existing distribution')
    .option('-y, --yes', 'do not ask before overwriting')
    .option('--all', 'copy every config file')
    .option('--pipeline', 'copy pipeline_conf.json')
    .option('--compose-override', 'copy docker-compose.override.yml')
    .option('--compose-dev', 'copy dev.yml')
    .option('--compose-proxy', 'copy proxy.yml')
    .option('--compose-local', 'copy local.yml')
    .action(async (name: string, options: NewDistOptions, command: Command) => {
        const { dreamRoot } = loadCliContext(command);
        let overwrite = options.overwrite ?? false;

        if (!overwrite && directoryExists(DreamDist.resolveDistPath(name, dreamRoot))) {
            if (options.yes) {
                overwrite = true;
            } else {
                const answer = await prompts({
                    type: 'confirm',
                    name: 'overwrite',
                    message: `Distribution ${name} already exists. Overwrite?`,
                    initial: false,
                });

                if (!answer.overwrite) {
                    logger.info('Cancelled.');
                    return;
                }
                overwrite = true;
            }
        }

        const flags = selectedFlags(options);
        if (!Object.values(flags).some(Boolean)) {
            logger.warn('No config files selected. Use --all or pick files with --pipeline, --compose-dev, ...');
        }

        const spinner = ora(`Creating ${name} from ${options.dist}...`).start();
        try {
            const dist = DreamDist.fromTemplate(name, dreamRoot, options.dist, options.services, flags);
            const paths = dist.save(overwrite);
            spinner.succeed(`Created new Dream distribution ${name} from ${options.dist}`);
            for (const path of paths) {
                logger.item(chalk.gray(path));
            }
        } catch (err) {
            spinner.fail(`Could not create ${name}`);
            throw err;
        }
    });

const newDffCommand = new Command('dff')
    .description('Create a new dff-based skill template in ./skills')
    .argument('<name>', 'skill name')
    .requiredOption('-d, --dist <name>', 'Dream distribution name')
    .action((name: string, options: { dist: string }, command: Command) => {
        const { dreamRoot, settings } = loadCliContext(command);
        const dist = DreamDist.fromName(options.dist, dreamRoot, {
            pipelineConf: false,
            composeOverride: false,
            composeDev: false,
            composeProxy: false,
            composeLocal: false,
        });

        const skillPath = dist.addDffSkill(name, resolveDffTemplate(dreamRoot, settings));
        logger.success(`Created new dff skill at ${skillPath}`);
    });

const newLocalCommand = new Command('local')
    .description('Create local.yml: chosen services from dev.yml, the rest from proxy.yml')
    .requiredOption('-d, --dist <name>', 'Dream distribution name')
    .option('-s, --services <names...>', 'services to run locally')
    .option('--drop-ports', 'remove ports from locally run services')
    .option('--no-drop-ports', 'keep ports of locally run services')
    .option('--single-replica', 'run one replica of every service')
    .option('--no-single-replica', 'keep deploy settings as they are')
    .option('--overwrite', 'overwrite an existing local.yml')
    .action((options: NewLocalOptions, command: Command) => {
        const { dreamRoot, settings } = loadCliContext(command);
        const dist = DreamDist.fromName(options.dist, dreamRoot, {
            pipelineConf: false,
            composeOverride: false,
            composeDev: true,
            composeProxy: true,
            composeLocal: false,
        });

        const path = dist.createLocalYml(options.services ?? [], {
            dropPorts: options.dropPorts ?? settings.local.dropPorts,
            singleReplica: options.singleReplica ?? settings.local.singleReplica,
            overwrite: options.overwrite ?? false,
            infraServices: settings.local.infraServices,
        });
        logger.success(`Created new local.yml under ${path}`);
    });

export const newCommand = new Command('new')
    .description('Create a new distribution, skill, or local.yml')
    .addCommand(newDistCommand)
    .addCommand(newDffCommand)
    .addCommand(newLocalCommand);
