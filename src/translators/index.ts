export {
  DEFAULT_AUTH_METHOD,
  DEFAULT_MODALITY,
  DEFAULT_PLACEHOLDER_URL,
  DEFAULT_RECORD_VERSION,
  PLACEHOLDER_SKILL,
  extractCapabilities,
  toAgentFacts,
  toRegistryEntry,
  type AgentFactsTranslationOptions,
} from './agentfacts.js';
export {
  COMMAND_URL_SCHEME,
  DEFAULT_AGENT_VERSION,
  DEFAULT_OASF_REGISTRY_ID,
  LOCATOR_ROLE_RULES,
  MCP_EXPORT_SERVER,
  MCP_EXTENSION_VERSION,
  MCP_RUNTIME_EXTENSION,
  buildMcpExtension,
  classifyLocator,
  decodeCommandUrl,
  encodeCommandUrl,
  parseAgentIdentifier,
  readMcpCommand,
  toNandaEntry,
  toOASFRecord,
  toRegistrationPayload,
  type AgentIdentifier,
  type CommandLine,
  type LocatorRole,
  type OasfExportOptions,
  type OasfSyncOptions,
} from './oasf.js';
export {
  DEFAULT_NANDA_VERSION,
  NANDA_REGISTRY_ID,
  NANDA_SCHEMA_VERSION,
  normalizeNandaEntry,
  resolveCapabilities,
  type NandaNormalizeOptions,
  type ResolvedCapabilities,
} from './nanda.js';
export { FIELD_ALIASES, parseRecordInput } from './field-rules.js';
