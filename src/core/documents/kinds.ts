/**
 * The five document kinds a distribution can hold.
 *
 * Dependency direction: kinds.ts → schema.ts, codec.ts, document.ts
 * Used by: compose.ts, pipeline.ts, dist/distribution.ts
 */

import { jsonCodec, yamlCodec } from './codec.js';
import type { ConfigKind } from './document.js';
import { composeFileSchema, pipelineConfSchema } from './schema.js';
import type { ComposeFile, PipelineConf } from './types.js';

export const PIPELINE_CONF: ConfigKind<PipelineConf> = {
    label: 'pipeline',
    defaultFileName: 'pipeline_conf.json',
    codec: jsonCodec,
    schema: pipelineConfSchema,
};

export const COMPOSE_OVERRIDE: ConfigKind<ComposeFile> = {
    label: 'compose override',
    defaultFileName: 'docker-compose.override.yml',
    codec: yamlCodec,
    schema: composeFileSchema,
};

export const COMPOSE_DEV: ConfigKind<ComposeFile> = {
    label: 'compose dev',
    defaultFileName: 'dev.yml',
    codec: yamlCodec,
    schema: composeFileSchema,
};

export const COMPOSE_PROXY: ConfigKind<ComposeFile> = {
    label: 'compose proxy',
    defaultFileName: 'proxy.yml',
    codec: yamlCodec,
    schema: composeFileSchema,
};

export const COMPOSE_LOCAL: ConfigKind<ComposeFile> = {
    label: 'compose local',
    defaultFileName: 'local.yml',
    codec: yamlCodec,
    schema: composeFileSchema,
};
