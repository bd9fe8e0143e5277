import type { AgentFactsRecord, NandaEntry, OASFRecord, RegistryEntry } from '../models/record-types.js';
import type { CapabilityMatch, LoadWarning } from '../models/taxonomy-types.js';
import type { ValidationResult } from '../models/validation-types.js';
import { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { TaxonomyIndex } from '../taxonomies/taxonomy-index.js';
import { toAgentFacts, toRegistryEntry } from '../translators/agentfacts.js';
import { toNandaEntry, toOASFRecord } from '../translators/oasf.js';
import { SchemaValidator } from '../validation/schema-validator.js';
import type { BridgeConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import type { Logger } from './logger.js';

export interface RecordTranslatorOptions {
  /** Without a taxonomy, capabilities become placeholder skills. */
  taxonomy?: TaxonomyIndex;
  validator: SchemaValidator;
  placeholderUrl?: string;
  registryId?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface TranslationOutcome {
  record: AgentFactsRecord;
  validation: ValidationResult;
}

/**
 * Entry point tying the taxonomy, the schema validator and the record
 * translators together.
 */
export class RecordTranslator {
  readonly matcher?: CapabilityMatcher;
  readonly validator: SchemaValidator;
  private readonly placeholderUrl?: string;
  private readonly registryId?: string;
  private readonly logger?: Logger;
  private readonly now?: () => Date;

  constructor(options: RecordTranslatorOptions) {
    this.matcher = options.taxonomy ? new CapabilityMatcher(options.taxonomy) : undefined;
    this.validator = options.validator;
    this.placeholderUrl = options.placeholderUrl;
    this.registryId = options.registryId;
    this.logger = options.logger;
    this.now = options.now;
  }

  toAgentFacts(raw: unknown): AgentFactsRecord {
    return toAgentFacts(raw, {
      matcher: this.matcher,
      placeholderUrl: this.placeholderUrl,
      logger: this.logger,
    });
  }

  toRegistryEntry(record: unknown): RegistryEntry {
    return toRegistryEntry(record);
  }

  toOASFRecord(agent: unknown): OASFRecord {
    return toOASFRecord(agent, { matcher: this.matcher, now: this.now, logger: this.logger });
  }

  toNandaEntry(record: unknown): NandaEntry {
    return toNandaEntry(record, {
      matcher: this.matcher,
      registryId: this.registryId,
      now: this.now,
      logger: this.logger,
    });
  }

  matchCapability(capability: string): CapabilityMatch | null {
    return this.matcher?.match(capability) ?? null;
  }

  validate(record: unknown): ValidationResult {
    return this.validator.validate(record);
  }

  /**
   * Translate a registry entry and validate the result against the schema.
   * Translation errors propagate; schema violations are reported.
   */
  translateAndValidate(raw: unknown): TranslationOutcome {
    const record = this.toAgentFacts(raw);
    return { record, validation: this.validate(record) };
  }
}

export interface CreateRecordTranslatorOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface RecordTranslatorSetup {
  translator: RecordTranslator;
  /** Catalog files skipped while loading the taxonomy. */
  warnings: LoadWarning[];
}

/**
 * Load the taxonomy and schema named by `config` and build a translator.
 *
 * @throws ConfigurationError when a taxonomy is required but no catalog directory is configured
 * @throws SchemaLoadError when the schema cannot be loaded
 * @throws CatalogMissingError when a required catalog directory is absent
 */
export function createRecordTranslator(
  config: BridgeConfig,
  options: CreateRecordTranslatorOptions = {}
): RecordTranslatorSetup {
  if (config.requireTaxonomy && config.taxonomyDir === null) {
    throw new ConfigurationError('OASF_TAXONOMY_REQUIRED is set but OASF_SCHEMA_DIR is not', ['OASF_SCHEMA_DIR']);
  }

  const validator = SchemaValidator.fromFile(config.schemaPath);
  let taxonomy: TaxonomyIndex | undefined;
  let warnings: LoadWarning[] = [];
  if (config.taxonomyDir !== null) {
    const loaded = TaxonomyIndex.load(config.taxonomyDir, {
      requireCatalog: config.requireTaxonomy,
      logger: options.logger,
    });
    taxonomy = loaded.index;
    warnings = loaded.warnings;
  }

  return {
    translator: new RecordTranslator({
      taxonomy,
      validator,
      placeholderUrl: config.placeholderUrl,
      registryId: config.registryId,
      logger: options.logger,
      now: options.now,
    }),
    warnings,
  };
}
