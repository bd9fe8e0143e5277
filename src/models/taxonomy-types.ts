/**
 * Skill taxonomy types
 * Shapes of the OASF skill catalog as loaded from disk, plus the mapping
 * payload produced when a capability resolves to a taxonomy skill.
 */

/**
 * Name a top-level skill extends to mark itself as a category root.
 */
export const ROOT_SKILL_SENTINEL = 'base_skill';

// Taxonomy node
export interface SkillDefinition {
  name: string;
  caption: string;
  uid: number;
  extends?: string;
}

// Top-level grouping, keyed by the name of a root skill
export interface CategoryMeta {
  key: string;
  caption: string;
  uid: number;
}

export interface AncestorChain {
  /** Parent names, nearest first. */
  chain: string[];
  categoryKey: string | null;
}

export type LoadWarningCode =
  | 'CATALOG_MISSING'
  | 'CATEGORY_FILE_INVALID'
  | 'SKILL_FILE_INVALID';

export interface LoadWarning {
  code: LoadWarningCode;
  path: string;
  message: string;
}

export interface TaxonomyStats {
  skills: number;
  leaves: number;
  categories: number;
}

// Capability mapping payload (wire names kept as emitted to directories)
export interface CapabilityMatch {
  skill_id: string;
  category_name: string | null;
  category_uid: number;
  class_name: string;
  class_uid: number;
}
