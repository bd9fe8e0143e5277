/**
 * OASF skill taxonomy: catalog index and capability matching.
 *
 * @example
 * ```typescript
 * import { TaxonomyIndex, CapabilityMatcher } from 'agentfacts-bridge';
 *
 * const { index } = TaxonomyIndex.load('./oasf/schema');
 * const matcher = new CapabilityMatcher(index);
 * matcher.match('chat');
 * ```
 */

export {
  CATEGORY_FILE_NAME,
  SKILLS_DIR_NAME,
  TaxonomyIndex,
  type TaxonomyLoadOptions,
  type TaxonomyLoadResult,
} from './taxonomy-index.js';
export { CapabilityMatcher, KEYWORD_RULES, normalizeCapability, type KeywordRule } from './capability-matcher.js';
