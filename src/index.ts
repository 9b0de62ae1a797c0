/**
 * Library entry point.
 *
 * Dependency direction: index.ts → core modules
 * Used by: package.json main entry
 */

export * from './types/index.js';

export { ComposeConfig, toContainer, type AddServiceOptions } from './core/documents/compose.js';
export { PipelineConfig, flattenServices } from './core/documents/pipeline.js';
export { parseConnectorUrl, connectorUrl } from './core/documents/connector-url.js';
export {
    DreamConfig,
    loadRaw,
    parseDocument,
    defaultPath,
    type ConfigKind,
    type FilterOptions,
} from './core/documents/document.js';
export { jsonCodec, yamlCodec, type ConfigCodec, type ConfigFormat } from './core/documents/codec.js';
export { PIPELINE_CONF, COMPOSE_OVERRIDE, COMPOSE_DEV, COMPOSE_PROXY, COMPOSE_LOCAL } from './core/documents/kinds.js';
export { DreamDist, listDistributions, existingConfigFlags, CONFIG_FILE_NAMES } from './core/dist/distribution.js';
export { isDreamRoot, assertDreamRoot } from './core/dream-root.js';
export { addDffSkill, BUNDLED_DFF_TEMPLATE } from './core/skills.js';
export { loadSettings, saveSettings, getDefaultSettings, resolveDreamRoot } from './core/config/manager.js';
