/**
 * TypeScript types inferred from the document schemas.
 *
 * Document types are never written by hand; they are derived from the Zod
 * schemas so the runtime check and the compile-time shape cannot drift.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches a document
 */

import { z } from 'zod';
import {
    composeContainerSchema,
    composeFileSchema,
    deploymentDefinitionSchema,
    pipelineConfSchema,
    pipelineConnectorSchema,
    pipelineServiceSchema,
    pipelineServicesSchema,
    SERVICE_CATEGORIES,
    SINGLETON_CATEGORIES,
} from './schema.js';

/** A complete pipeline_conf.json document. */
export type PipelineConf = z.infer<typeof pipelineConfSchema>;

/** The category-partitioned `services` block of a pipeline. */
export type PipelineServices = z.infer<typeof pipelineServicesSchema>;

/** A single pipeline service. */
export type PipelineService = z.infer<typeof pipelineServiceSchema>;

/** A pipeline connector. */
export type PipelineConnector = z.infer<typeof pipelineConnectorSchema>;

/** A category holding one service. */
export type SingletonCategory = (typeof SINGLETON_CATEGORIES)[number];

/** A category holding a name → service mapping. */
export type ServiceCategory = (typeof SERVICE_CATEGORIES)[number];

/** A compose document (override, dev, proxy or local). */
export type ComposeFile = z.infer<typeof composeFileSchema>;

/** A single compose container definition. */
export type ComposeContainer = z.infer<typeof composeContainerSchema>;

/** A compose `deploy` block. */
export type DeploymentDefinition = z.infer<typeof deploymentDefinitionSchema>;

/** Host, port and endpoint parsed out of a connector URL. */
export interface ConnectorAddress {
    host: string | null;
    port: string | null;
    endpoint: string | null;
}
