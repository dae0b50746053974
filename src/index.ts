// Change impact toolkit public API

export * from './models/index.js';
export * from './services/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel, type LoggerConfig, type LogLevelName } from './core/logger.js';
export {
  ChangeSpecificationSchema,
  ComponentManifestSchema,
  ContractDocumentSchema,
  ImpactConfigSchema,
  type ContractDocument,
  type ImpactConfig
} from './core/schemas.js';
export { OUTPUT_FORMATS, type OutputFormat } from './core/validation.js';
