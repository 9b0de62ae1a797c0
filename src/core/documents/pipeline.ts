/**
 * The pipeline document (pipeline_conf.json).
 *
 * Pipeline services are matched to compose containers through the host
 * part of their connector URL. Services with no URL fall back to their own
 * name with underscores turned into dashes, which is how container names
 * are spelled.
 *
 * Dependency direction: pipeline.ts → document.ts, kinds.ts, connector-url.ts, errors.ts
 * Used by: dist/distribution.ts, CLI commands
 */

import { connectorUrl, parseConnectorUrl } from './connector-url.js';
import {
    createNameMatcher,
    defaultPath,
    DreamConfig,
    loadRaw,
    parseDocument,
    type FilterOptions,
} from './document.js';
import { PIPELINE_CONF } from './kinds.js';
import { SERVICE_CATEGORIES, SINGLETON_CATEGORIES } from './schema.js';
import type {
    ConnectorAddress,
    PipelineConf,
    PipelineConnector,
    PipelineService,
    PipelineServices,
} from './types.js';
import { NotFoundError } from '../errors.js';
import { logger } from '../../utils/logger.js';

type NameMatcher = (name: string | null) => boolean;

/** Container name a pipeline service is matched by. */
function matchKey(name: string, service: PipelineService): string | null {
    const url = connectorUrl(service);
    if (url) {
        return parseConnectorUrl(url).host;
    }
    return name.replace(/_/g, '-');
}

function filterConnectors(
    connectors: Record<string, PipelineConnector>,
    matches: NameMatcher,
): Record<string, PipelineConnector> {
    const filtered: Record<string, PipelineConnector> = {};
    for (const [name, connector] of Object.entries(connectors)) {
        if (matches(parseConnectorUrl(connector.url).host)) {
            filtered[name] = connector;
        }
    }
    return filtered;
}

function filterServiceMap(
    services: Record<string, PipelineService>,
    matches: NameMatcher,
): Record<string, PipelineService> {
    const filtered: Record<string, PipelineService> = {};
    for (const [name, service] of Object.entries(services)) {
        if (matches(matchKey(name, service))) {
            filtered[name] = service;
        }
    }
    return filtered;
}

/**
 * All services in one name-keyed view. Singletons are keyed by their
 * category name.
 */
export function flattenServices(services: PipelineServices): Record<string, PipelineService> {
    const flattened: Record<string, PipelineService> = {};

    for (const category of SINGLETON_CATEGORIES) {
        const service = services[category];
        if (service) flattened[category] = service;
    }
    for (const category of SERVICE_CATEGORIES) {
        Object.assign(flattened, services[category] ?? {});
    }

    return flattened;
}

export class PipelineConfig extends DreamConfig<PipelineConf> {
    constructor(config: PipelineConf) {
        super(PIPELINE_CONF, config);
    }

    static fromPath(path: string): PipelineConfig {
        return new PipelineConfig(parseDocument(PIPELINE_CONF, loadRaw(path, PIPELINE_CONF.codec), path));
    }

    static fromDist(distPath: string): PipelineConfig {
        return PipelineConfig.fromPath(defaultPath(PIPELINE_CONF, distPath));
    }

    /** Flattened view of the current services, rebuilt on every call. */
    flattenedServices(): Record<string, PipelineService> {
        return flattenServices(this._config.services);
    }

    /** Hosts of every service that has a connector URL. */
    *containerNames(): Generator<string> {
        for (const service of Object.values(this.flattenedServices())) {
            const { host } = parseConnectorUrl(connectorUrl(service));
            if (host) {
                yield host;
            }
        }
    }

    /**
     * Where a service is reached.
     * @throws {NotFoundError} if no category holds the service
     */
    discoverHostPortEndpoint(service: string): ConnectorAddress {
        const definition = this.flattenedServices()[service];
        if (!definition) {
            throw new NotFoundError(`${service} not found in pipeline!`, { service });
        }
        return parseConnectorUrl(connectorUrl(definition));
    }

    /**
     * Keep connectors and services that match the given container names.
     *
     * Connectors and services with a URL match by URL host; services
     * without one match by dash-normalized name. The singleton services
     * are always kept.
     */
    filterServices(options: FilterOptions = {}): PipelineConfig {
        const matches = createNameMatcher(options);
        const source = this._config.services;
        const services: PipelineServices = { ...source };

        for (const category of SERVICE_CATEGORIES) {
            const categoryServices = source[category];
            if (categoryServices) {
                services[category] = filterServiceMap(categoryServices, matches);
            }
        }

        const config: PipelineConf = { ...this._config, services };
        if (this._config.connectors) {
            config.connectors = filterConnectors(this._config.connectors, matches);
        }

        logger.debug(
            `Filtered pipeline: ${Object.keys(flattenServices(services)).length}/` +
                `${Object.keys(this.flattenedServices()).length} services kept`,
        );

        const cloned = structuredClone(config);
        if (options.inPlace) {
            this._config = cloned;
            return this;
        }
        return new PipelineConfig(cloned);
    }
}
