/**
 * Record shapes exchanged between the Nanda registry, AgentFacts and OASF
 * directories. Field names follow each format's wire representation.
 */

import type { CapabilityMatch } from './taxonomy-types.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// AgentFacts
export interface AgentFactsProvider {
  name: string;
  url: string;
  [key: string]: string;
}

export interface AgentFactsSkill {
  id: string;
  description: string;
  inputModes: string[];
  outputModes: string[];
  latencyBudgetMs?: number;
}

export interface AgentFactsRecord {
  id: string;
  agent_name: string;
  label: string;
  description: string;
  version: string;
  provider: AgentFactsProvider;
  endpoints: {
    static: string[];
  };
  capabilities: {
    modalities: string[];
    authentication: {
      methods: string[];
    };
  };
  skills: AgentFactsSkill[];
}

// Minimal Nanda registry entry (AgentFacts -> registry direction)
export interface RegistryEntry {
  id: string;
  name: string;
  description: string;
  version: string;
  capabilities: string[];
  endpoints: string[];
}

// OASF
export interface OASFSkill {
  id?: number;
  name: string;
}

export interface OASFLocator {
  type: string;
  url: string;
}

export interface OASFExtension {
  name: string;
  version: string;
  data: JsonObject;
}

export interface OASFRecord {
  name: string;
  version: string;
  description: string;
  authors: string[];
  created_at: string;
  skills: OASFSkill[];
  locators: OASFLocator[];
  extensions: OASFExtension[];
  signature: JsonObject;
  schema_version?: string;
}

// Nanda federation entry (OASF -> Nanda direction)
export interface NandaEntry {
  agent_id: string;
  federated_id: string;
  registry_id: string;
  agent_name: string;
  version: string;
  description: string;
  capabilities: string[];
  taxonomy: CapabilityMatch[];
  agent_url: string;
  api_url: string | null;
  last_updated: string;
  schema_version: 'nanda-v1';
  source_schema: 'oasf' | 'nanda';
  oasf_schema_version?: string;
}

// Payload accepted by a registry's register call
export interface RegistrationPayload {
  agent_id: string;
  agent_url: string;
  api_url: string | null;
}
