/**
 * AgentFacts bridge
 * Main entry point - exports public API
 */

// Export models
export * from './models/index.js';

// Export errors and logging
export * from './core/errors.js';
export { consoleLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';

// Export configuration
export { DEFAULT_SCHEMA_PATH, loadBridgeConfig, resolveBridgeConfig } from './core/config.js';
export type { BridgeConfig, EnvSource, LoadBridgeConfigOptions } from './core/config.js';

// Export the translator facade
export { RecordTranslator, createRecordTranslator } from './core/record-translator.js';
export type {
  CreateRecordTranslatorOptions,
  RecordTranslatorOptions,
  RecordTranslatorSetup,
  TranslationOutcome,
} from './core/record-translator.js';

// Export taxonomy, validation and translators
export * from './taxonomies/index.js';
export { SchemaValidator, comparePaths, validateAgainstSchema } from './validation/schema-validator.js';
export * from './translators/index.js';

// Export federation
export { DEFAULT_REGISTRY_ID, FederationRouter, parseFederatedIdentifier } from './core/adapters.js';
export type {
  DirectoryAdapter,
  DirectoryAdapterHost,
  DirectoryAdapterId,
  DirectoryDescription,
  DirectoryFetcher,
  FederatedIdentifier,
  FederationRouterOptions,
  RegistryListing,
} from './core/adapters.js';
export { OasfDirectoryAdapter } from './adapters/oasf-directory.js';
export type { OasfDirectoryAdapterOptions } from './adapters/oasf-directory.js';
export { NandaRegistryAdapter } from './adapters/nanda-registry.js';
export type { NandaRegistryAdapterOptions } from './adapters/nanda-registry.js';

// Export sync planning
export {
  RECORD_FILE_SUFFIX,
  planDirectorySync,
  planRegistryExport,
  recordFileName,
} from './sync/directory-sync.js';
export type {
  DirectorySyncOptions,
  DirectorySyncPlan,
  ExportFile,
  RegistryExportOptions,
  RegistryExportPlan,
  SkippedRecord,
} from './sync/directory-sync.js';
