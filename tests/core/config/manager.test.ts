/**
 * Tests for the settings manager (load, save, validate, merge).
 *
 * Uses a temp directory to simulate a Dream root on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
    loadSettings,
    saveSettings,
    settingsExist,
    getSettingsPath,
    mergeSettings,
    deepMerge,
    getDefaultSettings,
    resolveDreamRoot,
    resolveDffTemplate,
} from '../../../src/core/config/manager.js';
import { DEFAULT_SETTINGS, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME } from '../../../src/core/config/defaults.js';
import { ConfigError, ParseError } from '../../../src/core/errors.js';
import { makeTempDir, removeDir } from '../../helpers/dream-fixture.js';

let testDir: string;

beforeEach(() => {
    testDir = makeTempDir();
});

afterEach(() => {
    if (existsSync(testDir)) {
        removeDir(testDir);
    }
});

function writeSettingsFile(content: string): void {
    const settingsDir = join(testDir, SETTINGS_DIR_NAME);
    mkdirSync(settingsDir, { recursive: true });
    writeFileSync(join(settingsDir, SETTINGS_FILE_NAME), content, 'utf-8');
}

describe('settingsExist', () => {
    it('returns false when no settings exist', () => {
        expect(settingsExist(testDir)).toBe(false);
    });

    it('returns true after saving settings', () => {
        saveSettings(testDir, DEFAULT_SETTINGS);
        expect(settingsExist(testDir)).toBe(true);
    });
});

describe('getSettingsPath', () => {
    it('returns the correct path', () => {
        expect(getSettingsPath(testDir)).toBe(join(testDir, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME));
    });
});

describe('saveSettings', () => {
    it('saves valid settings, creating directories, and overwrites on the next save', () => {
        const path = saveSettings(testDir, DEFAULT_SETTINGS);
        expect(path).toBe(getSettingsPath(testDir));
        expect(saveSettings(testDir, { logLevel: 'debug' })).toBe(path);
        expect(loadSettings(testDir).logLevel).toBe('debug');
    });

    it('throws ConfigError for invalid settings', () => {
        expect(() => saveSettings(testDir, { local: { infraServices: [''] } })).toThrow(ConfigError);
    });
});

describe('loadSettings', () => {
    it('returns defaults when no file exists', () => {
        expect(loadSettings(testDir)).toEqual(DEFAULT_SETTINGS);
    });

    it('applies defaults for missing fields', () => {
        writeSettingsFile('{ "local": { "dropPorts": false } }');
        const settings = loadSettings(testDir);

        expect(settings.local).toEqual({ dropPorts: false, singleReplica: true, infraServices: ['agent', 'mongo'] });
        expect(settings.logLevel).toBe('info');
    });

    it('throws ParseError for corrupted JSON', () => {
        writeSettingsFile('{ broken json }');
        expect(() => loadSettings(testDir)).toThrow(ParseError);
    });

    it('throws ConfigError listing invalid fields', () => {
        writeSettingsFile('{ "logLevel": "loud" }');
        expect(() => loadSettings(testDir)).toThrow(/logLevel/);
    });
});

describe('deepMerge', () => {
    it('deep merges nested objects', () => {
        const result = deepMerge({ local: { dropPorts: true, singleReplica: true } }, { local: { dropPorts: false } });
        expect(result).toEqual({ local: { dropPorts: false, singleReplica: true } });
    });

    it('replaces arrays instead of concatenating', () => {
        const result = deepMerge({ local: { infraServices: ['agent', 'mongo'] } }, { local: { infraServices: ['agent'] } });
        expect(result).toEqual({ local: { infraServices: ['agent'] } });
    });

    it('ignores undefined source values', () => {
        expect(deepMerge({ logLevel: 'info' }, { logLevel: undefined })).toEqual({ logLevel: 'info' });
    });
});

describe('mergeSettings', () => {
    it('re-validates the merged result', () => {
        expect(() => mergeSettings(DEFAULT_SETTINGS, { local: { infraServices: [''] } })).toThrow(ConfigError);
    });
});

describe('getDefaultSettings', () => {
    it('returns a copy of the defaults without overrides', () => {
        const settings = getDefaultSettings();
        settings.local.infraServices.push('redis');
        expect(DEFAULT_SETTINGS.local.infraServices).toEqual(['agent', 'mongo']);
    });

    it('applies partial overrides', () => {
        const settings = getDefaultSettings({ local: { singleReplica: false } });
        expect(settings.local.singleReplica).toBe(false);
        expect(settings.local.dropPorts).toBe(true);
    });
});

describe('resolveDreamRoot', () => {
    it('prefers the explicit option', () => {
        expect(resolveDreamRoot(testDir, { DREAM_ROOT_DIR: '/elsewhere' })).toBe(testDir);
    });

    it('falls back to DREAM_ROOT_DIR', () => {
        expect(resolveDreamRoot(undefined, { DREAM_ROOT_DIR: testDir })).toBe(testDir);
    });

    it('falls back to the working directory', () => {
        expect(resolveDreamRoot(undefined, {})).toBe(process.cwd());
    });
});

describe('resolveDffTemplate', () => {
    it('is undefined when no template is configured', () => {
        expect(resolveDffTemplate(testDir, DEFAULT_SETTINGS)).toBeUndefined();
    });

    it('resolves relative paths against the Dream root', () => {
        const settings = getDefaultSettings({ templates: { dffSkill: 'templates/dff' } });
        expect(resolveDffTemplate(testDir, settings)).toBe(join(testDir, 'templates', 'dff'));
    });

    it('keeps absolute paths', () => {
        const settings = getDefaultSettings({ templates: { dffSkill: '/opt/dff' } });
        expect(resolveDffTemplate(testDir, settings)).toBe('/opt/dff');
    });
});
