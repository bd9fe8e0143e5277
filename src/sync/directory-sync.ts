/**
 * Batch planning for directory synchronisation.
 *
 * Planners only compute what should be registered or written. Posting
 * payloads and writing files is left to the caller.
 */

import { BridgeError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { OASFRecord, RegistrationPayload } from '../models/record-types.js';
import type { CapabilityMatcher } from '../taxonomies/capability-matcher.js';
import { toOASFRecord, toRegistrationPayload } from '../translators/oasf.js';

export const RECORD_FILE_SUFFIX = '.record.json';

export interface SkippedRecord {
  /** Position of the record in the input batch. */
  index: number;
  reason: string;
}

export interface DirectorySyncOptions {
  /** Only the first `limit` records are considered. */
  limit?: number;
  logger?: Logger;
}

export interface DirectorySyncPlan {
  payloads: RegistrationPayload[];
  skipped: SkippedRecord[];
}

export interface RegistryExportOptions extends DirectorySyncOptions {
  matcher?: CapabilityMatcher;
  now?: () => Date;
}

export interface ExportFile {
  fileName: string;
  record: OASFRecord;
}

export interface RegistryExportPlan {
  files: ExportFile[];
  skipped: SkippedRecord[];
}

export const recordFileName = (name: string): string => `${name.replace(/\//g, '-')}${RECORD_FILE_SUFFIX}`;

const takeBatch = <T>(items: readonly T[], limit?: number): readonly T[] =>
  limit !== undefined && limit >= 0 ? items.slice(0, limit) : items;

/**
 * Runs `convert` over each item, collecting bridge errors as skips. Any
 * other error propagates.
 */
const planEach = <T, R>(
  items: readonly T[],
  options: DirectorySyncOptions,
  convert: (item: T) => R
): { results: R[]; skipped: SkippedRecord[] } => {
  const results: R[] = [];
  const skipped: SkippedRecord[] = [];
  takeBatch(items, options.limit).forEach((item, index) => {
    try {
      results.push(convert(item));
    } catch (error) {
      if (!(error instanceof BridgeError)) {
        throw toError(error);
      }
      skipped.push({ index, reason: error.message });
      options.logger?.('sync:record-skipped', { index, code: error.code, reason: error.message });
    }
  });
  return { results, skipped };
};

/**
 * Plan registration of OASF directory records in a Nanda registry.
 */
export function planDirectorySync(
  records: readonly unknown[],
  options: DirectorySyncOptions = {}
): DirectorySyncPlan {
  const { results, skipped } = planEach(records, options, (record) => toRegistrationPayload(record));
  options.logger?.('sync:planned', { direction: 'oasf-to-nanda', planned: results.length, skipped: skipped.length });
  return { payloads: results, skipped };
}

/**
 * Plan export of Nanda registry agents as OASF record files.
 */
export function planRegistryExport(
  agents: readonly unknown[],
  options: RegistryExportOptions = {}
): RegistryExportPlan {
  const { results, skipped } = planEach(agents, options, (agent): ExportFile => {
    const record = toOASFRecord(agent, { matcher: options.matcher, now: options.now, logger: options.logger });
    return { fileName: recordFileName(record.name), record };
  });
  options.logger?.('sync:planned', { direction: 'nanda-to-oasf', planned: results.length, skipped: skipped.length });
  return { files: results, skipped };
}
