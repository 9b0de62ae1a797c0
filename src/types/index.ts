/**
 * Global shared types re-exported from a single entry point.
 *
 * Dependency direction: types/index.ts → nothing (leaf module)
 * Used by: src/index.ts
 */

// Re-export all error types
export {
    AppError,
    NotFoundError,
    ParseError,
    SchemaError,
    AlreadyExistsError,
    InvalidArgumentError,
    NotADirectoryError,
    ConfigError,
} from '../core/errors.js';

// Re-export document types
export type {
    PipelineConf,
    PipelineServices,
    PipelineService,
    PipelineConnector,
    SingletonCategory,
    ServiceCategory,
    ComposeFile,
    ComposeContainer,
    DeploymentDefinition,
    ConnectorAddress,
} from '../core/documents/types.js';

// Re-export settings types
export type { Settings, LocalSettings, TemplateSettings, SettingsInput } from '../core/config/types.js';

// Re-export distribution types
export type {
    DreamDistConfigs,
    LoadFlags,
    DistPaths,
    DistIdentity,
    LocalYmlOptions,
} from '../core/dist/distribution.js';
