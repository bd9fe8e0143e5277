import {
  DEFAULT_REGISTRY_ID,
  type DirectoryAdapter,
  type DirectoryAdapterId,
  type DirectoryDescription,
  type DirectoryFetcher,
} from '../core/adapters.js';
import type { Logger } from '../core/logger.js';
import type { NandaEntry } from '../models/record-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { normalizeNandaEntry } from '../translators/nanda.js';

export interface NandaRegistryAdapterOptions {
  fetchRecord: DirectoryFetcher;
  matcher?: CapabilityMatcher;
  logger?: Logger;
}

export class NandaRegistryAdapter implements DirectoryAdapter {
  readonly id: DirectoryAdapterId = DEFAULT_REGISTRY_ID;
  private readonly fetchRecord: DirectoryFetcher;
  private readonly matcher?: CapabilityMatcher;
  private readonly logger?: Logger;

  constructor(options: NandaRegistryAdapterOptions) {
    this.fetchRecord = options.fetchRecord;
    this.matcher = options.matcher;
    this.logger = options.logger;
  }

  async lookup(name: string): Promise<NandaEntry | null> {
    const record = await this.fetchRecord(name);
    if (record === null || record === undefined) {
      return null;
    }
    return normalizeNandaEntry(record, { matcher: this.matcher, logger: this.logger });
  }

  describe(): DirectoryDescription {
    return {
      id: this.id,
      schema: 'nanda',
      description: 'Local Nanda registry entries',
    };
  }
}
