import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { join } from 'node:path';
import { loadCliContext, type CliContext } from '../../src/cli/utils/context.js';
import { createProgram } from '../../src/cli/program.js';
import { saveSettings } from '../../src/core/config/manager.js';
import { NotADirectoryError } from '../../src/core/errors.js';
import { getLogLevel, LogLevel, setLogLevel } from '../../src/utils/logger.js';
import { createDreamRoot, makeTempDir, removeDir } from '../helpers/dream-fixture.js';

/** A root program with the global options and one subcommand that records its context. */
function contextProgram(requireDreamRoot: boolean = true): { program: Command; captured: CliContext[] } {
    const captured: CliContext[] = [];
    const program = new Command()
        .exitOverride()
        .option('-D, --dream <path>')
        .option('--verbose')
        .option('--quiet');

    program.addCommand(
        new Command('probe').action((_options: unknown, command: Command) => {
            captured.push(loadCliContext(command, requireDreamRoot));
        }),
    );

    return { program, captured };
}

describe('loadCliContext', () => {
    let root: string;

    beforeEach(() => {
        root = createDreamRoot();
    });

    afterEach(() => {
        removeDir(root);
        setLogLevel(LogLevel.Info);
        vi.restoreAllMocks();
    });

    it('uses -D as the Dream root and loads its settings', () => {
        saveSettings(root, { local: { dropPorts: false } });
        const { program, captured } = contextProgram();

        program.parse(['-D', root, 'probe'], { from: 'user' });

        expect(captured).toHaveLength(1);
        expect(captured[0]?.dreamRoot).toBe(root);
        expect(captured[0]?.settings.local.dropPorts).toBe(false);
    });

    it('applies the log level from the settings file', () => {
        saveSettings(root, { logLevel: 'warn' });
        const { program } = contextProgram();

        program.parse(['-D', root, 'probe'], { from: 'user' });

        expect(getLogLevel()).toBe(LogLevel.Warn);
    });

    it('lets --verbose and --quiet override the settings', () => {
        saveSettings(root, { logLevel: 'warn' });

        contextProgram().program.parse(['-D', root, '--verbose', 'probe'], { from: 'user' });
        expect(getLogLevel()).toBe(LogLevel.Debug);

        contextProgram().program.parse(['-D', root, '--quiet', 'probe'], { from: 'user' });
        expect(getLogLevel()).toBe(LogLevel.Error);
    });

    it('rejects a directory that is not a Dream root', () => {
        const plain = makeTempDir();
        try {
            const { program } = contextProgram();
            expect(() => program.parse(['-D', plain, 'probe'], { from: 'user' })).toThrow(NotADirectoryError);
        } finally {
            removeDir(plain);
        }
    });

    it('skips the Dream root check when not required', () => {
        const plain = makeTempDir();
        try {
            const { program, captured } = contextProgram(false);
            program.parse(['-D', plain, 'probe'], { from: 'user' });
            expect(captured[0]?.dreamRoot).toBe(plain);
        } finally {
            removeDir(plain);
        }
    });
});

describe('dreamtools program', () => {
    let root: string;

    beforeEach(() => {
        root = createDreamRoot();
    });

    afterEach(() => {
        removeDir(root);
        setLogLevel(LogLevel.Info);
        vi.restoreAllMocks();
    });

    it('registers every command', () => {
        const names = createProgram().commands.map((command) => command.name());
        expect(names).toEqual(['new', 'list', 'show', 'config']);
    });

    it('lists distributions', async () => {
        const output = vi.spyOn(console, 'info').mockImplementation(() => undefined);
        vi.spyOn(console, 'log').mockImplementation(() => undefined);

        await createProgram().parseAsync(['-D', root, 'list'], { from: 'user' });

        expect(output).toHaveBeenCalledTimes(1);
        expect(output).toHaveBeenCalledWith(expect.stringContaining('dream'));
    });

    it('prints the settings path', async () => {
        const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        await createProgram().parseAsync(['-D', root, 'config', '--path'], { from: 'user' });

        expect(output).toHaveBeenCalledWith(join(root, '.dreamtools', 'config.json'));
    });
});
