/**
 * Zod schemas for the distribution documents.
 *
 * Every object schema is `.passthrough()`: fields that are not modelled here
 * are kept verbatim so a document survives a load/save cycle unchanged.
 * Nothing declares a `.default()`, for the same reason.
 *
 * Dependency direction: schema.ts → zod
 * Used by: types.ts, kinds.ts, compose.ts
 */

import { z } from 'zod';

// ── Pipeline (pipeline_conf.json) ──

/**
 * Schema for a connector: how the agent reaches a service.
 * HTTP connectors carry a `url`; python connectors carry a `class_name`.
 */
export const pipelineConnectorSchema = z
    .object({
        protocol: z.string().optional(),
        timeout: z.number().optional(),
        url: z.string().optional(),
        class_name: z.string().optional(),
    })
    .passthrough();

/**
 * Schema for a single pipeline service.
 * `connector` is either an inline connector or a reference such as `"connectors.sentseg"`.
 */
export const pipelineServiceSchema = z
    .object({
        connector: z.union([z.string(), pipelineConnectorSchema]).optional(),
        previous_services: z.array(z.string()).optional(),
        required_previous_services: z.array(z.string()).optional(),
        state_manager_method: z.string().optional(),
        tags: z.array(z.string()).optional(),
        is_enabled: z.boolean().optional(),
    })
    .passthrough();

/** Schema for one service category: service name → service. */
export const pipelineServiceMapSchema = z.record(pipelineServiceSchema);

/** Categories holding a single service rather than a mapping. */
export const SINGLETON_CATEGORIES = ['last_chance_service', 'timeout_service', 'bot_annotator_selector'] as const;

/** Categories holding a name → service mapping, in pipeline order. */
export const SERVICE_CATEGORIES = [
    'post_annotators',
    'annotators',
    'skill_selectors',
    'skills',
    'post_skill_selector_annotators',
    'response_selectors',
] as const;

/**
 * Schema for the `services` block, partitioned by category.
 */
export const pipelineServicesSchema = z
    .object({
        last_chance_service: pipelineServiceSchema.optional(),
        timeout_service: pipelineServiceSchema.optional(),
        bot_annotator_selector: pipelineServiceSchema.optional(),
        post_annotators: pipelineServiceMapSchema.optional(),
        annotators: pipelineServiceMapSchema.optional(),
        skill_selectors: pipelineServiceMapSchema.optional(),
        skills: pipelineServiceMapSchema.optional(),
        post_skill_selector_annotators: pipelineServiceMapSchema.optional(),
        response_selectors: pipelineServiceMapSchema.optional(),
    })
    .passthrough();

/**
 * The complete pipeline document schema.
 */
export const pipelineConfSchema = z
    .object({
        connectors: z.record(pipelineConnectorSchema).optional(),
        services: pipelineServicesSchema,
    })
    .passthrough();

// ── Compose (docker-compose.override.yml, dev.yml, proxy.yml, local.yml) ──

/** Schema for a container `deploy` block. */
export const deploymentDefinitionSchema = z
    .object({
        mode: z.string().optional(),
        replicas: z.number().int().min(0).optional(),
        resources: z.record(z.unknown()).optional(),
    })
    .passthrough();

/** Schema for a `build` block, either a context path or a full definition. */
export const buildDefinitionSchema = z.union([
    z.string(),
    z
        .object({
            context: z.string().optional(),
            dockerfile: z.string().optional(),
            args: z.record(z.unknown()).optional(),
        })
        .passthrough(),
]);

/**
 * Schema for a single container definition.
 * Only `ports` and `deploy` are ever rewritten; the rest is carried as-is.
 */
export const composeContainerSchema = z
    .object({
        image: z.string().optional(),
        build: buildDefinitionSchema.optional(),
        command: z.union([z.string(), z.array(z.string())]).optional(),
        environment: z
            .union([z.array(z.string()), z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))])
            .optional(),
        env_file: z.union([z.string(), z.array(z.union([z.string(), z.record(z.unknown())]))]).optional(),
        ports: z.array(z.union([z.string(), z.number(), z.record(z.unknown())])).optional(),
        volumes: z.array(z.union([z.string(), z.record(z.unknown())])).optional(),
        deploy: deploymentDefinitionSchema.optional(),
    })
    .passthrough();

/**
 * Schema shared by the four compose document variants.
 */
export const composeFileSchema = z
    .object({
        version: z.union([z.string(), z.number()]),
        services: z.record(composeContainerSchema),
    })
    .passthrough();
