/**
 * Tests for the settings Zod schemas.
 */

import { describe, it, expect } from 'vitest';
import { localSettingsSchema, settingsSchema, templateSettingsSchema } from '../../../src/core/config/schema.js';

describe('localSettingsSchema', () => {
    it('applies all defaults', () => {
        const result = localSettingsSchema.safeParse({});
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data).toEqual({ dropPorts: true, singleReplica: true, infraServices: ['agent', 'mongo'] });
        }
    });

    it('rejects empty service names', () => {
        expect(localSettingsSchema.safeParse({ infraServices: ['agent', ''] }).success).toBe(false);
    });

    it('rejects non-boolean flags', () => {
        expect(localSettingsSchema.safeParse({ dropPorts: 'yes' }).success).toBe(false);
    });
});

describe('templateSettingsSchema', () => {
    it('accepts an empty object', () => {
        expect(templateSettingsSchema.safeParse({}).success).toBe(true);
    });

    it('rejects an empty template path', () => {
        expect(templateSettingsSchema.safeParse({ dffSkill: '' }).success).toBe(false);
    });
});

describe('settingsSchema', () => {
    it('fills every section from an empty object', () => {
        const result = settingsSchema.safeParse({});
        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.version).toBe(1);
            expect(result.data.logLevel).toBe('info');
            expect(result.data.local.dropPorts).toBe(true);
            expect(result.data.templates).toEqual({});
        }
    });

    it('rejects wrong version number', () => {
        expect(settingsSchema.safeParse({ version: 2 }).success).toBe(false);
    });

    it('rejects unknown log levels', () => {
        expect(settingsSchema.safeParse({ logLevel: 'trace' }).success).toBe(false);
    });
});
