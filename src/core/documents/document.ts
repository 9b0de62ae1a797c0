/**
 * Generic document machinery: load, validate, serialize, write.
 *
 * A document kind is a plain record (file name, codec, schema). All the
 * format-specific behaviour comes from the injected codec, so there is one
 * loader and one writer for every kind.
 *
 * Dependency direction: document.ts → zod, codec.ts, utils/fs.ts, errors.ts
 * Used by: compose.ts, pipeline.ts, kinds.ts
 */

import { join, resolve } from 'node:path';
import type { z } from 'zod';
import type { ConfigCodec } from './codec.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { SchemaError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Everything that distinguishes one document kind from another. */
export interface ConfigKind<T> {
    /** Short label used in log and error messages. */
    readonly label: string;
    readonly defaultFileName: string;
    readonly codec: ConfigCodec;
    readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Read a file and decode it into a plain value, without validation.
 * @throws {NotFoundError} if the file is missing
 * @throws {ParseError} if the text is malformed
 */
export function loadRaw(path: string, codec: ConfigCodec): unknown {
    const absolutePath = resolve(path);
    logger.debug(`Loading ${codec.format} from ${absolutePath}`);
    return codec.decode(readTextFile(absolutePath), absolutePath);
}

/**
 * Validate a plain value against a kind's schema.
 * @throws {SchemaError} listing every failing field
 */
export function parseDocument<T>(kind: ConfigKind<T>, raw: unknown, source: string): T {
    const result = kind.schema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues
            .map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
            .join('\n');

        throw new SchemaError(`Invalid ${kind.label} document ${source}:\n${issues}`, {
            filePath: source,
            issues: result.error.issues,
        });
    }

    return result.data;
}

/** Path of a kind's default file inside a distribution directory. */
export function defaultPath<T>(kind: ConfigKind<T>, distPath: string): string {
    return join(resolve(distPath), kind.defaultFileName);
}

/**
 * Base class for a typed document bound to its kind.
 */
export abstract class DreamConfig<T> {
    protected _config: T;

    constructor(
        readonly kind: ConfigKind<T>,
        config: T,
    ) {
        this._config = config;
    }

    /** Current document content. */
    get config(): T {
        return this._config;
    }

    /** Encode the document with its kind's codec. */
    serialize(): string {
        return this.kind.codec.encode(this._config);
    }

    /**
     * Write the document to `path`.
     * @throws {AlreadyExistsError} if the file exists and `overwrite` is false
     */
    toPath(path: string, overwrite: boolean = false): string {
        const absolutePath = resolve(path);
        writeTextFile(absolutePath, this.serialize(), overwrite);
        logger.debug(`Saved ${this.kind.label} to ${absolutePath}`);
        return absolutePath;
    }

    /** Write the document under its default file name inside `distPath`. */
    toDist(distPath: string, overwrite: boolean = false): string {
        return this.toPath(defaultPath(this.kind, distPath), overwrite);
    }

    /**
     * Keep only the selected services. Each document kind decides what
     * "a service matches" means.
     */
    abstract filterServices(options?: FilterOptions): DreamConfig<T>;
}

/** Options shared by every `filterServices` implementation. */
export interface FilterOptions {
    /** Names to keep. Absent or empty means every name. */
    include?: readonly string[];
    /** Names to drop, applied after `include`. */
    exclude?: readonly string[];
    /** Replace this document's content instead of returning a new document. */
    inPlace?: boolean;
}

/**
 * Build the include/exclude predicate used by every filter.
 * A `null` key (e.g. a connector without URL) only passes when nothing is included explicitly.
 */
export function createNameMatcher(options: FilterOptions): (name: string | null) => boolean {
    const include = options.include && options.include.length > 0 ? new Set(options.include) : null;
    const exclude = new Set(options.exclude ?? []);

    return (name) => {
        if (name === null) return include === null;
        return (include === null || include.has(name)) && !exclude.has(name);
    };
}
