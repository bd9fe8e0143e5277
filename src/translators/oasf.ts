/**
 * Nanda agent <-> OASF directory record conversion.
 *
 * Export (Nanda -> OASF) splits the `name:version` identifier, turns agent
 * and API URLs into typed locators and decodes a `cmd://` API URL into an MCP
 * runtime extension. Sync (OASF -> Nanda) classifies locators by type and
 * encodes the MCP runtime extension back into a `cmd://` API URL.
 */

import { MissingIdentityError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type {
  JsonObject,
  NandaEntry,
  OASFExtension,
  OASFLocator,
  OASFRecord,
  OASFSkill,
  RegistrationPayload,
} from '../models/record-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { extractCapabilities } from './agentfacts.js';
import {
  FIELD_ALIASES,
  isRecord,
  parseRecordInput,
  pickText,
  requireText,
  stringList,
  type RawRecord,
} from './field-rules.js';
import { NANDA_SCHEMA_VERSION, resolveCapabilities } from './nanda.js';

export const DEFAULT_AGENT_VERSION = 'v0';
export const DEFAULT_OASF_REGISTRY_ID = 'agntcy';
export const MCP_RUNTIME_EXTENSION = 'schema.oasf.agntcy.org/features/runtime/mcp';
export const MCP_RUNTIME_FEATURE = 'runtime/mcp';
export const MCP_EXTENSION_VERSION = 'v1.0.0';
export const MCP_EXPORT_SERVER = 'nanda-export';
export const COMMAND_URL_SCHEME = 'cmd://';
const COMMAND_ARGS_MARKER = '?args=';

export type LocatorRole = 'agent' | 'api';

/**
 * Locator type needles, checked in order against the lower-cased type.
 */
export const LOCATOR_ROLE_RULES: ReadonlyArray<{ needle: string; role: LocatorRole }> = [
  { needle: 'bridge', role: 'agent' },
  { needle: 'source', role: 'agent' },
  { needle: 'github', role: 'agent' },
  { needle: 'docker', role: 'agent' },
  { needle: 'api', role: 'api' },
  { needle: 'service', role: 'api' },
];

export interface AgentIdentifier {
  name: string;
  version: string;
}

export interface CommandLine {
  command: string;
  args: string[];
}

export interface OasfExportOptions {
  matcher?: CapabilityMatcher;
  /** Clock used when the agent carries no update timestamp. */
  now?: () => Date;
  logger?: Logger;
}

export interface OasfSyncOptions {
  matcher?: CapabilityMatcher;
  /** Registry id stamped on the entry and its federated id. */
  registryId?: string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Split `name:version` at the last colon; a missing or empty version
 * becomes `v0`.
 */
export function parseAgentIdentifier(identifier: string): AgentIdentifier {
  const separator = identifier.lastIndexOf(':');
  if (separator < 0) {
    return { name: identifier, version: DEFAULT_AGENT_VERSION };
  }
  const version = identifier.slice(separator + 1);
  return {
    name: identifier.slice(0, separator),
    version: version.length > 0 ? version : DEFAULT_AGENT_VERSION,
  };
}

export const encodeCommandUrl = ({ command, args }: CommandLine): string =>
  `${COMMAND_URL_SCHEME}${command}${COMMAND_ARGS_MARKER}${args.join(' ')}`;

export const decodeCommandUrl = (url: string): CommandLine | null => {
  if (!url.startsWith(COMMAND_URL_SCHEME)) {
    return null;
  }
  const rest = url.slice(COMMAND_URL_SCHEME.length);
  const marker = rest.indexOf(COMMAND_ARGS_MARKER);
  const command = marker >= 0 ? rest.slice(0, marker) : rest;
  const args = marker >= 0 ? rest.slice(marker + COMMAND_ARGS_MARKER.length).split(/\s+/).filter(Boolean) : [];
  return command.length > 0 ? { command, args } : null;
};

export const buildMcpExtension = ({ command, args }: CommandLine): OASFExtension => ({
  name: MCP_RUNTIME_EXTENSION,
  version: MCP_EXTENSION_VERSION,
  data: {
    servers: {
      [MCP_EXPORT_SERVER]: { command, args: [...args], env: {} },
    },
  },
});

/**
 * First server command declared by an MCP runtime extension, if any.
 */
export const readMcpCommand = (extensions: unknown): CommandLine | null => {
  if (!Array.isArray(extensions)) {
    return null;
  }
  for (const extension of extensions) {
    if (!isRecord(extension) || typeof extension.name !== 'string' || !extension.name.includes(MCP_RUNTIME_FEATURE)) {
      continue;
    }
    const servers = isRecord(extension.data) ? extension.data.servers : undefined;
    if (!isRecord(servers)) {
      continue;
    }
    for (const server of Object.values(servers)) {
      if (!isRecord(server)) {
        continue;
      }
      const command = pickText(server, ['command']);
      if (command !== undefined) {
        return { command, args: stringList(server.args) };
      }
    }
  }
  return null;
};

export const classifyLocator = (type: string): LocatorRole | null => {
  const lowered = type.toLowerCase();
  return LOCATOR_ROLE_RULES.find((rule) => lowered.includes(rule.needle))?.role ?? null;
};

const readLocators = (value: unknown): OASFLocator[] => {
  if (!Array.isArray(value)) {
    return [];
  }
  const locators: OASFLocator[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }
    const url = pickText(entry, ['url']);
    if (url !== undefined) {
      locators.push({ type: typeof entry.type === 'string' ? entry.type : '', url });
    }
  }
  return locators;
};

const buildExportDescription = (identifier: string, capabilities: string[], tags: string[]): string => {
  const parts: string[] = [];
  if (capabilities.length > 0) {
    parts.push(`Capabilities: ${capabilities.join(', ')}`);
  }
  if (tags.length > 0) {
    parts.push(`Tags: ${tags.join(', ')}`);
  }
  const base = `Exported agent ${identifier} from Nanda registry.`;
  return parts.length > 0 ? `${base} ${parts.join(' | ')}` : base;
};

const toOasfSkills = (capabilities: readonly string[], options: OasfExportOptions): OASFSkill[] => {
  const { matcher } = options;
  if (!matcher) {
    return [];
  }
  const skills: OASFSkill[] = [];
  const seen = new Set<string>();
  for (const capability of capabilities) {
    const skill = matcher.matchSkill(capability);
    if (!skill) {
      options.logger?.('translate:capability-unmatched', { capability });
      continue;
    }
    if (seen.has(skill.name)) {
      continue;
    }
    seen.add(skill.name);
    skills.push({ id: skill.uid, name: matcher.index.qualifiedName(skill.name) });
  }
  return skills;
};

/**
 * Convert a Nanda registry agent into an OASF directory record.
 *
 * @throws MissingIdentityError when the agent has no identifier or its name part is empty
 */
export function toOASFRecord(input: unknown, options: OasfExportOptions = {}): OASFRecord {
  const raw = parseRecordInput(input, 'Registry agent');
  const identifier = requireText(raw, FIELD_ALIASES.agentIdentifier);
  const { name, version } = parseAgentIdentifier(identifier);
  if (name.length === 0) {
    throw new MissingIdentityError(
      FIELD_ALIASES.agentIdentifier,
      `Agent identifier "${identifier}" has no name part`
    );
  }

  const capabilities = extractCapabilities(raw.capabilities);
  const agentUrl = pickText(raw, ['agent_url']);
  const apiUrl = pickText(raw, ['api_url']);

  const locators: OASFLocator[] = [];
  if (agentUrl !== undefined) {
    locators.push({ type: 'bridge-url', url: agentUrl });
  }
  if (apiUrl !== undefined) {
    locators.push({ type: 'api-url', url: apiUrl });
  }

  const extensions: OASFExtension[] = [];
  const command = apiUrl !== undefined ? decodeCommandUrl(apiUrl) : null;
  if (command) {
    extensions.push(buildMcpExtension(command));
  }

  const now = options.now ?? (() => new Date());
  const signature: JsonObject = {};

  return {
    name,
    version,
    description: buildExportDescription(identifier, capabilities, stringList(raw.tags)),
    authors: [],
    created_at: pickText(raw, FIELD_ALIASES.createdAt) ?? now().toISOString(),
    skills: toOasfSkills(capabilities, options),
    locators,
    extensions,
    signature,
  };
}

const skillLeafNames = (skills: unknown): string[] => {
  if (!Array.isArray(skills)) {
    return [];
  }
  const names: string[] = [];
  for (const skill of skills) {
    const qualified = typeof skill === 'string' ? skill.trim() : isRecord(skill) ? pickText(skill, ['name']) : undefined;
    const leaf = qualified?.split('/').pop()?.trim();
    if (leaf) {
      names.push(leaf);
    }
  }
  return names;
};

const resolveUrls = (
  raw: RawRecord,
  agentId: string
): { agentUrl: string; apiUrl: string | null } => {
  const locators = readLocators(raw.locators);
  let agentUrl: string | undefined;
  let apiUrl: string | undefined;
  for (const locator of locators) {
    const role = classifyLocator(locator.type);
    if (role === 'agent' && agentUrl === undefined) {
      agentUrl = locator.url;
    } else if (role === 'api' && apiUrl === undefined) {
      apiUrl = locator.url;
    }
  }

  const command = readMcpCommand(raw.extensions);
  return {
    agentUrl: agentUrl ?? locators[0]?.url ?? `placeholder://${agentId}`,
    apiUrl: command ? encodeCommandUrl(command) : apiUrl ?? null,
  };
};

/**
 * Convert an OASF directory record into a Nanda entry.
 *
 * @throws MissingIdentityError when the record has no name
 */
export function toNandaEntry(input: unknown, options: OasfSyncOptions = {}): NandaEntry {
  const raw = parseRecordInput(input, 'OASF record');
  const name = requireText(raw, ['name']);
  const version = pickText(raw, FIELD_ALIASES.version) ?? DEFAULT_AGENT_VERSION;
  const registryId = options.registryId ?? DEFAULT_OASF_REGISTRY_ID;
  const agentId = `${name}:${version}`.replace(/\//g, '-');
  const { agentUrl, apiUrl } = resolveUrls(raw, agentId);
  const { capabilities, taxonomy } = resolveCapabilities(
    skillLeafNames(raw.skills),
    options.matcher,
    options.logger
  );
  const now = options.now ?? (() => new Date());

  return {
    agent_id: agentId,
    federated_id: `@${registryId}:${name}`,
    registry_id: registryId,
    agent_name: name,
    version,
    description: typeof raw.description === 'string' ? raw.description : '',
    capabilities,
    taxonomy,
    agent_url: agentUrl,
    api_url: apiUrl,
    last_updated: pickText(raw, ['created_at']) ?? now().toISOString(),
    schema_version: NANDA_SCHEMA_VERSION,
    source_schema: 'oasf',
    oasf_schema_version: pickText(raw, ['schema_version']) ?? 'unknown',
  };
}

/**
 * The payload a registry's register call takes for an OASF record.
 */
export function toRegistrationPayload(input: unknown): RegistrationPayload {
  const entry = toNandaEntry(input);
  return {
    agent_id: entry.agent_id,
    agent_url: entry.agent_url,
    api_url: entry.api_url,
  };
}
