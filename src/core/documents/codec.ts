/**
 * Text codecs for the two on-disk formats.
 *
 * A codec turns file text into a plain structured value and back. The
 * document layer never touches JSON or YAML directly.
 *
 * Dependency direction: codec.ts → yaml, errors.ts
 * Used by: kinds.ts, document.ts, settings manager
 */

import { parse, stringify } from 'yaml';
import { ParseError } from '../errors.js';

export type ConfigFormat = 'json' | 'yaml';

/** Encode/decode capability injected into a document kind. */
export interface ConfigCodec {
    readonly format: ConfigFormat;
    /**
     * Parse file text.
     * @param source - file path used in error messages
     * @throws {ParseError} on malformed input
     */
    decode(text: string, source: string): unknown;
    encode(data: unknown): string;
}

/**
 * Drop `undefined` at every depth. `undefined` is the "unset" marker in
 * documents; explicit `null` values are real data and stay.
 */
export function omitUnset(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.filter((item) => item !== undefined).map(omitUnset);
    }
    if (value !== null && typeof value === 'object') {
        const result: Record<string, unknown> = {};
        for (const [key, item] of Object.entries(value)) {
            if (item !== undefined) {
                result[key] = omitUnset(item);
            }
        }
        return result;
    }
    return value;
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export const jsonCodec: ConfigCodec = {
    format: 'json',

    decode(text: string, source: string): unknown {
        try {
            return JSON.parse(text);
        } catch (err) {
            throw new ParseError(`Failed to parse JSON file: ${source}`, {
                filePath: source,
                originalError: describe(err),
            });
        }
    },

    encode(data: unknown): string {
        return JSON.stringify(omitUnset(data), null, 4) + '\n';
    },
};

/**
 * Compose files are read by YAML 1.1 parsers, so both directions use 1.1:
 * strings such as `"on"` or `"22:22"` stay quoted, and `<<` merge keys are
 * resolved on read.
 */
const YAML_OPTIONS = { version: '1.1', merge: true } as const;

export const yamlCodec: ConfigCodec = {
    format: 'yaml',

    decode(text: string, source: string): unknown {
        try {
            return parse(text, YAML_OPTIONS);
        } catch (err) {
            throw new ParseError(`Failed to parse YAML file: ${source}`, {
                filePath: source,
                originalError: describe(err),
            });
        }
    },

    encode(data: unknown): string {
        return stringify(omitUnset(data), { ...YAML_OPTIONS, indent: 2, lineWidth: 0 });
    },
};
