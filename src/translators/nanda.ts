import type { Logger } from '../core/logger.js';
import type { NandaEntry } from '../models/record-types.js';
import type { CapabilityMatch } from '../models/taxonomy-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { extractCapabilities } from './agentfacts.js';
import { FIELD_ALIASES, parseRecordInput, pickText, requireText } from './field-rules.js';

export const NANDA_REGISTRY_ID = 'nanda';
export const NANDA_SCHEMA_VERSION = 'nanda-v1';
export const DEFAULT_NANDA_VERSION = 'v1.0.0';

export interface ResolvedCapabilities {
  capabilities: string[];
  taxonomy: CapabilityMatch[];
}

/**
 * Reduce capability or skill names to unique capability ids. With a matcher,
 * a name resolving to a taxonomy skill is replaced by the skill id and its
 * mapping payload is collected.
 */
export const resolveCapabilities = (
  names: readonly string[],
  matcher?: CapabilityMatcher,
  logger?: Logger
): ResolvedCapabilities => {
  const capabilities: string[] = [];
  const taxonomy: CapabilityMatch[] = [];
  const seen = new Set<string>();

  for (const name of names) {
    const match = matcher?.match(name) ?? null;
    if (matcher && !match && logger) {
      logger('translate:capability-unmatched', { capability: name });
    }
    const id = match?.skill_id ?? name;
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    capabilities.push(id);
    if (match) {
      taxonomy.push(match);
    }
  }
  return { capabilities, taxonomy };
};

export interface NandaNormalizeOptions {
  matcher?: CapabilityMatcher;
  logger?: Logger;
}

/**
 * Fill in the Nanda entry shape for a record coming from a local registry,
 * which already speaks the Nanda format.
 *
 * @throws MissingIdentityError when neither `agent_id` nor `id` is usable
 */
export function normalizeNandaEntry(input: unknown, options: NandaNormalizeOptions = {}): NandaEntry {
  const raw = parseRecordInput(input, 'Registry entry');
  const agentId = requireText(raw, FIELD_ALIASES.nandaId);
  const { capabilities, taxonomy } = resolveCapabilities(
    extractCapabilities(raw.capabilities),
    options.matcher,
    options.logger
  );

  return {
    agent_id: agentId,
    federated_id: `@${NANDA_REGISTRY_ID}:${agentId}`,
    registry_id: NANDA_REGISTRY_ID,
    agent_name: pickText(raw, FIELD_ALIASES.nandaName) ?? agentId,
    version: pickText(raw, FIELD_ALIASES.version) ?? DEFAULT_NANDA_VERSION,
    description: typeof raw.description === 'string' ? raw.description : '',
    capabilities,
    taxonomy,
    agent_url: pickText(raw, ['agent_url']) ?? '',
    api_url: pickText(raw, ['api_url']) ?? null,
    last_updated: pickText(raw, FIELD_ALIASES.lastUpdated) ?? '',
    schema_version: NANDA_SCHEMA_VERSION,
    source_schema: 'nanda',
  };
}
