/**
 * Connector URL parsing.
 *
 * A connector URL looks like `http://sentseg:8011/sentseg`. Its host is the
 * compose service that backs the pipeline service, which is how pipeline
 * entries are matched against container names.
 *
 * Dependency direction: connector-url.ts → types.ts
 * Used by: pipeline.ts
 */

import type { ConnectorAddress, PipelineService } from './types.js';

/**
 * Split a connector URL into host, port and endpoint.
 *
 * - `http://annotator:8080/respond` → `annotator`, `8080`, `respond`
 * - `annotator:8080` → `annotator`, `8080`, `''`
 * - no URL → all `null`
 *
 * A URL without a port yields a `null` port.
 */
export function parseConnectorUrl(url?: string | null): ConnectorAddress {
    if (!url) {
        return { host: null, port: null, endpoint: null };
    }

    const schemeEnd = url.indexOf('//');
    const rest = schemeEnd === -1 ? url : url.slice(schemeEnd + 2);

    const slash = rest.indexOf('/');
    const authority = slash === -1 ? rest : rest.slice(0, slash);
    const endpoint = slash === -1 ? '' : rest.slice(slash + 1);

    const colon = authority.indexOf(':');
    const host = colon === -1 ? authority : authority.slice(0, colon);
    const port = colon === -1 ? null : authority.slice(colon + 1);

    return { host, port, endpoint };
}

/**
 * URL of a service's inline connector, if it has one.
 * Services whose connector is a reference string have no URL of their own.
 */
export function connectorUrl(service: PipelineService): string | undefined {
    const connector = service.connector;
    if (connector === undefined || typeof connector === 'string') {
        return undefined;
    }
    return connector.url;
}
