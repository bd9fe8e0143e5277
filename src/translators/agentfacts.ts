/**
 * Registry entry <-> AgentFacts record conversion.
 *
 * The registry -> AgentFacts direction enriches capabilities with taxonomy
 * skills when a matcher is supplied. The reverse direction is lossy: provider,
 * authentication methods and per-skill detail do not survive.
 */

import type { Logger } from '../core/logger.js';
import type {
  AgentFactsProvider,
  AgentFactsRecord,
  AgentFactsSkill,
  RegistryEntry,
} from '../models/record-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import {
  FIELD_ALIASES,
  asText,
  isRecord,
  parseRecordInput,
  pickText,
  pickValue,
  requireText,
  stringList,
  unique,
  type RawRecord,
} from './field-rules.js';

export const DEFAULT_PLACEHOLDER_URL = 'https://example.com';
export const DEFAULT_RECORD_VERSION = '1.0.0';
export const DEFAULT_MODALITY = 'text';
export const DEFAULT_AUTH_METHOD = 'none';

export const PLACEHOLDER_SKILL: Readonly<AgentFactsSkill> = Object.freeze({
  id: 'skill:placeholder',
  description: 'Placeholder skill',
  inputModes: [DEFAULT_MODALITY],
  outputModes: [DEFAULT_MODALITY],
});

export interface AgentFactsTranslationOptions {
  /** Enables taxonomy skill enrichment. */
  matcher?: CapabilityMatcher;
  /** URL used where the provider has none. */
  placeholderUrl?: string;
  logger?: Logger;
}

const buildProvider = (raw: RawRecord, label: string, placeholderUrl: string): AgentFactsProvider => {
  const fallbackUrl = pickText(raw, FIELD_ALIASES.providerUrl) ?? placeholderUrl;
  const provider = raw.provider;
  if (!isRecord(provider)) {
    return { name: label, url: fallbackUrl };
  }

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(provider)) {
    if (typeof value === 'string') {
      fields[key] = value;
    }
  }
  return {
    ...fields,
    name: asText(provider.name) ?? label,
    url: asText(provider.url) ?? fallbackUrl,
  };
};

const normalizeEndpoints = (value: unknown): string[] => {
  if (typeof value === 'string') {
    return [value];
  }
  return stringList(value);
};

/**
 * Capability names from strings or `{ name | id }` objects, in input order.
 */
export const extractCapabilities = (value: unknown): string[] => {
  const entries = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  const names: string[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      if (entry.trim().length > 0) {
        names.push(entry);
      }
    } else if (isRecord(entry)) {
      const name = pickText(entry, ['name', 'id']);
      if (name !== undefined) {
        names.push(name);
      }
    }
  }
  return names;
};

const toSkills = (capabilities: readonly string[], options: AgentFactsTranslationOptions): AgentFactsSkill[] => {
  const skills: AgentFactsSkill[] = [];
  const seen = new Set<string>();
  const add = (skill: AgentFactsSkill): void => {
    if (seen.has(skill.id)) {
      return;
    }
    seen.add(skill.id);
    skills.push(skill);
  };

  for (const capability of capabilities) {
    const match = options.matcher?.match(capability) ?? null;
    if (match) {
      add({
        id: match.skill_id,
        description: `Skill mapped from capability '${capability}' (class: ${match.class_name})`,
        inputModes: [DEFAULT_MODALITY],
        outputModes: [DEFAULT_MODALITY],
      });
      continue;
    }
    if (options.matcher && options.logger) {
      options.logger('translate:capability-unmatched', { capability });
    }
    add({
      id: `skill:${capability}`,
      description: `Capability skill for ${capability}`,
      inputModes: [DEFAULT_MODALITY],
      outputModes: [DEFAULT_MODALITY],
    });
  }

  if (skills.length === 0) {
    add({
      ...PLACEHOLDER_SKILL,
      inputModes: [...PLACEHOLDER_SKILL.inputModes],
      outputModes: [...PLACEHOLDER_SKILL.outputModes],
    });
  }
  return skills;
};

/**
 * Convert a Nanda registry entry into an AgentFacts record.
 *
 * Identity comes from `id`, `agent_id` or `name` (first present). The result
 * always carries at least one skill; skills are unique by id, first
 * occurrence kept.
 *
 * @throws MissingIdentityError when no identity field is usable
 * @throws MalformedInputError when the input is not a JSON object
 */
export function toAgentFacts(
  input: unknown,
  options: AgentFactsTranslationOptions = {}
): AgentFactsRecord {
  const raw = parseRecordInput(input, 'Registry entry');
  const id = requireText(raw, FIELD_ALIASES.id);
  const label = pickText(raw, FIELD_ALIASES.label) ?? id;
  const description = pickText(raw, FIELD_ALIASES.description) ?? '';
  const version = pickText(raw, FIELD_ALIASES.version) ?? DEFAULT_RECORD_VERSION;
  const placeholderUrl = options.placeholderUrl ?? DEFAULT_PLACEHOLDER_URL;

  const capabilities = unique(extractCapabilities(raw.capabilities));

  return {
    id,
    agent_name: id,
    label,
    description,
    version,
    provider: buildProvider(raw, label, placeholderUrl),
    endpoints: {
      static: normalizeEndpoints(pickValue(raw, FIELD_ALIASES.endpoints)),
    },
    capabilities: {
      modalities: capabilities.length > 0 ? [...capabilities] : [DEFAULT_MODALITY],
      authentication: {
        methods: [DEFAULT_AUTH_METHOD],
      },
    },
    skills: toSkills(capabilities, options),
  };
}

/**
 * Convert an AgentFacts record into the minimal registry entry shape.
 * Only identity, description, version, modalities and static endpoints survive.
 *
 * @throws MissingIdentityError when neither `id` nor `agent_name` is usable
 */
export function toRegistryEntry(input: unknown): RegistryEntry {
  const record = parseRecordInput(input, 'AgentFacts record');
  const id = requireText(record, FIELD_ALIASES.recordId);
  const capabilities = isRecord(record.capabilities) ? stringList(record.capabilities.modalities) : [];
  const endpoints = isRecord(record.endpoints) ? stringList(record.endpoints.static) : [];

  return {
    id,
    name: pickText(record, ['label']) ?? id,
    description: typeof record.description === 'string' ? record.description : '',
    version: pickText(record, FIELD_ALIASES.version) ?? DEFAULT_RECORD_VERSION,
    capabilities,
    endpoints,
  };
}
