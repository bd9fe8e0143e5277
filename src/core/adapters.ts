import type { NandaEntry } from '../models/record-types.js';
import type { Logger } from './logger.js';

export type DirectoryAdapterId = string;

/**
 * Fetches one raw record by agent name from a remote directory; resolves
 * `null` when the directory has no such agent.
 */
export type DirectoryFetcher = (name: string) => Promise<unknown | null>;

export interface DirectoryDescription {
  id: DirectoryAdapterId;
  schema: 'oasf' | 'nanda';
  description: string;
}

export interface DirectoryAdapter {
  readonly id: DirectoryAdapterId;
  lookup: (name: string) => Promise<NandaEntry | null>;
  describe: () => DirectoryDescription;
}

export interface DirectoryAdapterHost {
  registerAdapter: (adapter: DirectoryAdapter) => void;
}

export interface FederatedIdentifier {
  registryId: DirectoryAdapterId;
  name: string;
}

export const DEFAULT_REGISTRY_ID = 'nanda';

/**
 * `@registry:name` or `registry:name` split at the first colon; a bare
 * name belongs to the default registry.
 */
export const parseFederatedIdentifier = (identifier: string): FederatedIdentifier => {
  const stripped = identifier.startsWith('@') ? identifier.slice(1) : identifier;
  const separator = stripped.indexOf(':');
  if (separator < 0) {
    return { registryId: DEFAULT_REGISTRY_ID, name: stripped };
  }
  return {
    registryId: stripped.slice(0, separator),
    name: stripped.slice(separator + 1),
  };
};

export interface FederationRouterOptions {
  logger?: Logger;
}

export interface RegistryListing {
  registries: DirectoryDescription[];
  count: number;
}

export class FederationRouter implements DirectoryAdapterHost {
  private readonly adapters = new Map<DirectoryAdapterId, DirectoryAdapter>();
  private readonly logger?: Logger;

  constructor(options: FederationRouterOptions = {}) {
    this.logger = options.logger;
  }

  registerAdapter(adapter: DirectoryAdapter): void {
    this.adapters.set(adapter.id, adapter);
  }

  getAdapter(id: DirectoryAdapterId): DirectoryAdapter | undefined {
    return this.adapters.get(id);
  }

  listRegistries(): RegistryListing {
    const registries = [...this.adapters.values()].map((adapter) => adapter.describe());
    return { registries, count: registries.length };
  }

  /**
   * Resolve a federated identifier through the adapter of its registry.
   * Unknown registries and misses resolve `null`; fetcher failures reject.
   */
  async lookup(identifier: string): Promise<NandaEntry | null> {
    const { registryId, name } = parseFederatedIdentifier(identifier);
    const adapter = this.adapters.get(registryId);
    if (!adapter) {
      this.log('federation:lookup', { identifier, registryId, outcome: 'unknown-registry' });
      return null;
    }
    const entry = await adapter.lookup(name);
    this.log('federation:lookup', { identifier, registryId, outcome: entry ? 'found' : 'missing' });
    return entry;
  }

  private log(message: string, extra?: Record<string, unknown>): void {
    if (this.logger) {
      this.logger(message, extra);
    }
  }
}
