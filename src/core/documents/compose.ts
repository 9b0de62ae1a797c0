/**
 * Compose documents (docker-compose.override.yml, dev.yml, proxy.yml, local.yml).
 *
 * Dependency direction: compose.ts → document.ts, kinds.ts, schema.ts, errors.ts
 * Used by: dist/distribution.ts, CLI commands
 */

import {
    createNameMatcher,
    defaultPath,
    DreamConfig,
    loadRaw,
    parseDocument,
    type ConfigKind,
    type FilterOptions,
} from './document.js';
import { composeContainerSchema } from './schema.js';
import type { ComposeContainer, ComposeFile } from './types.js';
import { NotFoundError, SchemaError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Options for `addService`. */
export interface AddServiceOptions {
    /** Mutate this document instead of returning a new one. */
    inPlace?: boolean;
}

/**
 * Validate any container-shaped value as a compose container.
 * Returns a fresh copy; the input is not touched.
 * @throws {SchemaError} if the value is not a container definition
 */
export function toContainer(name: string, value: unknown): ComposeContainer {
    const result = composeContainerSchema.safeParse(structuredClone(value));
    if (!result.success) {
        throw new SchemaError(`Service "${name}" is not a valid container definition`, {
            service: name,
            issues: result.error.issues,
        });
    }
    return result.data;
}

export class ComposeConfig extends DreamConfig<ComposeFile> {
    /** Load a compose document of the given kind from a file. */
    static fromPath(kind: ConfigKind<ComposeFile>, path: string): ComposeConfig {
        return new ComposeConfig(kind, parseDocument(kind, loadRaw(path, kind.codec), path));
    }

    /** Load a compose document of the given kind from its default file in a distribution. */
    static fromDist(kind: ConfigKind<ComposeFile>, distPath: string): ComposeConfig {
        return ComposeConfig.fromPath(kind, defaultPath(kind, distPath));
    }

    /** Names of all services, in document order. */
    serviceNames(): string[] {
        return Object.keys(this._config.services);
    }

    /** Iterate `[name, container]` pairs. */
    *iterServices(): Generator<[string, ComposeContainer]> {
        for (const entry of Object.entries(this._config.services)) {
            yield entry;
        }
    }

    /**
     * Look up a single container definition.
     * @throws {NotFoundError} if the service is not defined
     */
    getService(name: string): ComposeContainer {
        const service = this._config.services[name];
        if (!service) {
            throw new NotFoundError(`${name} not found in ${this.kind.defaultFileName}`, { service: name });
        }
        return service;
    }

    /**
     * Keep services whose name is included and not excluded.
     * `version` and every other top-level field are carried over.
     */
    filterServices(options: FilterOptions = {}): ComposeConfig {
        const matches = createNameMatcher(options);
        const services: Record<string, ComposeContainer> = {};

        for (const [name, container] of Object.entries(this._config.services)) {
            if (matches(name)) {
                services[name] = container;
            }
        }

        logger.debug(
            `Filtered ${this.kind.label}: ${Object.keys(services).length}/${this.serviceNames().length} services kept`,
        );
        return this.withConfig(structuredClone({ ...this._config, services }), options.inPlace);
    }

    /** Insert or replace one service; all other services are kept. */
    addService(name: string, container: ComposeContainer, options: AddServiceOptions = {}): ComposeConfig {
        const config = structuredClone(this._config);
        config.services[name] = structuredClone(container);
        return this.withConfig(config, options.inPlace);
    }

    private withConfig(config: ComposeFile, inPlace: boolean = false): ComposeConfig {
        if (inPlace) {
            this._config = config;
            return this;
        }
        return new ComposeConfig(this.kind, config);
    }
}
