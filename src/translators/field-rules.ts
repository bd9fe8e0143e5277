/**
 * Input normalisation shared by the record translators.
 *
 * Source records alias the same field under several keys. Each alias list
 * below is an ordered accessor rule: the first key holding a non-blank string
 * (or a finite number) wins.
 */

import { MalformedInputError, MissingIdentityError, toError } from '../core/errors.js';

export type RawRecord = Record<string, unknown>;

export const FIELD_ALIASES = {
  // Registry entry -> AgentFacts
  id: ['id', 'agent_id', 'name'],
  label: ['label', 'name'],
  description: ['description', 'caption'],
  version: ['version'],
  endpoints: ['endpoints', 'endpoint'],
  providerUrl: ['provider_url'],
  // AgentFacts -> registry entry
  recordId: ['id', 'agent_name'],
  // Nanda agent -> OASF
  agentIdentifier: ['agent_id', 'id', 'name'],
  createdAt: ['last_update', 'last_updated'],
  // Local registry entry -> Nanda entry
  nandaId: ['agent_id', 'id'],
  nandaName: ['agent_name', 'agent_id', 'name'],
  lastUpdated: ['last_updated', 'last_update'],
} as const satisfies Record<string, readonly string[]>;

export const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Accept a parsed JSON object or its text form.
 *
 * @throws MalformedInputError when text does not parse or the value is not a JSON object
 */
export const parseRecordInput = (input: unknown, kind: string): RawRecord => {
  let value = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new MalformedInputError(`${kind} is not valid JSON`, toError(error));
    }
  }
  if (!isRecord(value)) {
    const actual = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
    throw new MalformedInputError(`${kind} must be a JSON object, received ${actual}`);
  }
  return value;
};

export const asText = (value: unknown): string | undefined => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
};

export const pickText = (record: RawRecord, keys: readonly string[]): string | undefined => {
  for (const key of keys) {
    const text = asText(record[key]);
    if (text !== undefined) {
      return text;
    }
  }
  return undefined;
};

export const requireText = (record: RawRecord, keys: readonly string[]): string => {
  const text = pickText(record, keys);
  if (text === undefined) {
    throw new MissingIdentityError(keys);
  }
  return text;
};

export const pickValue = (record: RawRecord, keys: readonly string[]): unknown => {
  for (const key of keys) {
    const value = record[key];
    if (value === undefined || value === null || value === '') {
      continue;
    }
    if (Array.isArray(value) && value.length === 0) {
      continue;
    }
    return value;
  }
  return undefined;
};

export const stringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];

/**
 * Drop repeats, keeping first occurrences in order.
 */
export const unique = <T>(values: readonly T[]): T[] => [...new Set(values)];
