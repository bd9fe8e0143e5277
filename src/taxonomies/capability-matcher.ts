import type { CapabilityMatch, SkillDefinition } from '../models/taxonomy-types.js';
import type { TaxonomyIndex } from './taxonomy-index.js';

export interface KeywordRule {
  needle: string;
  target: string;
}

/**
 * Ordered fallback table: the first needle contained in the normalized
 * capability selects its target skill.
 */
export const KEYWORD_RULES: readonly KeywordRule[] = [
  { needle: 'chat', target: 'natural_language_generation' },
  { needle: 'conversation', target: 'natural_language_generation' },
  { needle: 'classif', target: 'text_classification' },
  { needle: 'retriev', target: 'information_retrieval_synthesis' },
  { needle: 'search', target: 'information_retrieval_synthesis' },
  { needle: 'vision', target: 'image_classification' },
  { needle: 'image', target: 'image_classification' },
  { needle: 'tool', target: 'tool_use_planning' },
];

/**
 * Lower-case, trim, and collapse every run of whitespace or hyphens into a
 * single underscore: `"Text-Classification"` -> `"text_classification"`.
 */
export const normalizeCapability = (capability: string): string =>
  capability.trim().toLowerCase().replace(/[\s-]+/g, '_');

/**
 * Resolves free-text capabilities to taxonomy skills.
 *
 * Strategies, first success wins:
 * 1. exact leaf name
 * 2. substring of a leaf caption (leaves scanned in name order)
 * 3. keyword rule; a non-leaf target is replaced by its first child in name order
 */
export class CapabilityMatcher {
  private readonly rules: readonly KeywordRule[];

  constructor(
    private readonly taxonomy: TaxonomyIndex,
    rules: readonly KeywordRule[] = KEYWORD_RULES
  ) {
    this.rules = rules;
  }

  get index(): TaxonomyIndex {
    return this.taxonomy;
  }

  match(capability: string): CapabilityMatch | null {
    const skill = this.matchSkill(capability);
    return skill ? this.toPayload(skill) : null;
  }

  matchSkill(capability: string): SkillDefinition | null {
    const normalized = normalizeCapability(capability);
    if (normalized.length === 0) {
      return null;
    }

    if (this.taxonomy.isLeaf(normalized)) {
      return this.taxonomy.getSkill(normalized) ?? null;
    }

    const leaves = this.taxonomy.leaves();
    const byCaption = leaves.find((leaf) => leaf.caption.toLowerCase().includes(normalized));
    if (byCaption) {
      return byCaption;
    }

    for (const { needle, target } of this.rules) {
      if (!normalized.includes(needle)) {
        continue;
      }
      const candidate = this.taxonomy.getSkill(target);
      if (!candidate) {
        continue;
      }
      if (this.taxonomy.isLeaf(target)) {
        return candidate;
      }
      const [firstChild] = this.taxonomy.childrenOf(target);
      return (firstChild !== undefined ? this.taxonomy.getSkill(firstChild) : undefined) ?? candidate;
    }

    return null;
  }

  toPayload(skill: SkillDefinition): CapabilityMatch {
    const { categoryKey } = this.taxonomy.ancestorChain(skill.name);
    const category = categoryKey !== null ? this.taxonomy.category(categoryKey) : null;
    return {
      skill_id: skill.name,
      category_name: category?.caption ?? null,
      category_uid: category?.uid ?? 0,
      class_name: skill.caption,
      class_uid: skill.uid,
    };
  }
}
