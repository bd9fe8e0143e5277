import type {
  DirectoryAdapter,
  DirectoryAdapterId,
  DirectoryDescription,
  DirectoryFetcher,
} from '../core/adapters.js';
import type { Logger } from '../core/logger.js';
import type { NandaEntry } from '../models/record-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { DEFAULT_OASF_REGISTRY_ID, toNandaEntry } from '../translators/oasf.js';

export interface OasfDirectoryAdapterOptions {
  fetchRecord: DirectoryFetcher;
  id?: DirectoryAdapterId;
  matcher?: CapabilityMatcher;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Serves lookups from an OASF directory, translating each record into a
 * Nanda entry stamped with this adapter's registry id.
 */
export class OasfDirectoryAdapter implements DirectoryAdapter {
  readonly id: DirectoryAdapterId;
  private readonly fetchRecord: DirectoryFetcher;
  private readonly matcher?: CapabilityMatcher;
  private readonly now?: () => Date;
  private readonly logger?: Logger;

  constructor(options: OasfDirectoryAdapterOptions) {
    this.id = options.id ?? DEFAULT_OASF_REGISTRY_ID;
    this.fetchRecord = options.fetchRecord;
    this.matcher = options.matcher;
    this.now = options.now;
    this.logger = options.logger;
  }

  async lookup(name: string): Promise<NandaEntry | null> {
    const record = await this.fetchRecord(name);
    if (record === null || record === undefined) {
      return null;
    }
    return toNandaEntry(record, {
      matcher: this.matcher,
      registryId: this.id,
      now: this.now,
      logger: this.logger,
    });
  }

  describe(): DirectoryDescription {
    return {
      id: this.id,
      schema: 'oasf',
      description: 'OASF directory records translated to Nanda entries',
    };
  }
}
