/**
 * In-memory index over an OASF-style skill catalog.
 *
 * Catalog layout:
 * ```
 * <root>/skill_categories.json      { attributes: { <key>: { caption, uid } } }
 * <root>/skills/**\/*.json           { name, caption, uid, extends? }
 * ```
 * A skill extending {@link ROOT_SKILL_SENTINEL} is the root of a category.
 * The index is built once and never mutated afterwards.
 */

import { existsSync, readFileSync, readdirSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { CatalogFileError, CatalogMissingError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import {
  ROOT_SKILL_SENTINEL,
  type AncestorChain,
  type CategoryMeta,
  type LoadWarning,
  type SkillDefinition,
  type TaxonomyStats,
} from '../models/taxonomy-types.js';

export const CATEGORY_FILE_NAME = 'skill_categories.json';
export const SKILLS_DIR_NAME = 'skills';

const skillFileSchema = z.object({
  name: z.string().trim().min(1),
  caption: z.string().nullish(),
  uid: z.number().int().nullish(),
  extends: z.string().nullish(),
});

const categoryEntrySchema = z.object({
  caption: z.string().nullish(),
  uid: z.number().int().nullish(),
});

const categoryMappingSchema = z.record(categoryEntrySchema);
const wrappedCategoryFileSchema = z
  .object({ attributes: categoryMappingSchema })
  .transform((file) => file.attributes);

export interface TaxonomyLoadOptions {
  /** Throw CatalogMissingError instead of degrading to an empty index. */
  requireCatalog?: boolean;
  logger?: Logger;
}

export interface TaxonomyLoadResult {
  index: TaxonomyIndex;
  warnings: LoadWarning[];
}

const describeZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');

/**
 * JSON files under `dir`, depth first in sorted name order. A directory that
 * cannot be listed is reported through `onUnreadable` and skipped.
 */
const listJsonFiles = (dir: string, onUnreadable: (dir: string, error: Error) => void): string[] => {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    onUnreadable(dir, toError(error));
    return [];
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...listJsonFiles(fullPath, onUnreadable));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(fullPath);
    }
  }
  return files;
};

const isDirectory = (path: string): boolean => existsSync(path) && statSync(path).isDirectory();

export class TaxonomyIndex {
  private readonly skillsByName: ReadonlyMap<string, SkillDefinition>;
  private readonly childrenByParent: ReadonlyMap<string, readonly string[]>;
  private readonly categoriesByKey: ReadonlyMap<string, CategoryMeta>;
  private readonly leafNames: readonly string[];

  private constructor(
    skills: ReadonlyMap<string, SkillDefinition>,
    categories: ReadonlyMap<string, CategoryMeta>
  ) {
    this.skillsByName = skills;
    this.categoriesByKey = categories;

    const children = new Map<string, string[]>();
    for (const skill of skills.values()) {
      // A self-reference is no edge: the skill stays a leaf.
      if (skill.extends === undefined || skill.extends === skill.name) {
        continue;
      }
      const siblings = children.get(skill.extends) ?? [];
      siblings.push(skill.name);
      children.set(skill.extends, siblings);
    }
    for (const siblings of children.values()) {
      siblings.sort();
    }
    this.childrenByParent = children;

    this.leafNames = [...skills.keys()]
      .filter((name) => (children.get(name)?.length ?? 0) === 0)
      .sort();
  }

  static empty(): TaxonomyIndex {
    return new TaxonomyIndex(new Map(), new Map());
  }

  /**
   * Build an index from definitions already in memory. A later definition
   * replaces an earlier one with the same name.
   */
  static fromDefinitions(
    skills: readonly SkillDefinition[],
    categories: readonly CategoryMeta[] = []
  ): TaxonomyIndex {
    const skillMap = new Map<string, SkillDefinition>();
    for (const skill of skills) {
      skillMap.set(skill.name, Object.freeze({ ...skill }));
    }
    const categoryMap = new Map<string, CategoryMeta>();
    for (const category of categories) {
      categoryMap.set(category.key, Object.freeze({ ...category }));
    }
    return new TaxonomyIndex(skillMap, categoryMap);
  }

  /**
   * Load a catalog from disk. Never fails on a missing catalog or a bad file
   * (unless `requireCatalog` is set): problems are returned as warnings next
   * to a usable, possibly empty, index.
   */
  static load(catalogRoot: string, options: TaxonomyLoadOptions = {}): TaxonomyLoadResult {
    const log: Logger = options.logger ?? (() => undefined);
    const warnings: LoadWarning[] = [];

    if (!isDirectory(catalogRoot)) {
      const error = new CatalogMissingError(catalogRoot);
      if (options.requireCatalog) {
        throw error;
      }
      log('taxonomy:catalog-missing', { catalogRoot });
      warnings.push({ code: 'CATALOG_MISSING', path: catalogRoot, message: error.message });
      return { index: TaxonomyIndex.empty(), warnings };
    }

    const skip = (code: LoadWarning['code'], path: string, error: CatalogFileError): void => {
      log('taxonomy:file-skipped', { path, reason: error.message });
      warnings.push({ code, path, message: error.message });
    };

    const categories = new Map<string, CategoryMeta>();
    const categoryFile = join(catalogRoot, CATEGORY_FILE_NAME);
    if (existsSync(categoryFile)) {
      const parsed = TaxonomyIndex.readJson(categoryFile);
      if (parsed instanceof CatalogFileError) {
        skip('CATEGORY_FILE_INVALID', categoryFile, parsed);
      } else {
        const wrapped = typeof parsed === 'object' && parsed !== null && 'attributes' in parsed;
        const result = (wrapped ? wrappedCategoryFileSchema : categoryMappingSchema).safeParse(parsed);
        if (!result.success) {
          skip(
            'CATEGORY_FILE_INVALID',
            categoryFile,
            new CatalogFileError(categoryFile, describeZodError(result.error))
          );
        } else {
          for (const [key, entry] of Object.entries(result.data)) {
            categories.set(key, Object.freeze({ key, caption: entry.caption ?? key, uid: entry.uid ?? 0 }));
          }
        }
      }
    }

    const skills = new Map<string, SkillDefinition>();
    const skillsRoot = join(catalogRoot, SKILLS_DIR_NAME);
    if (isDirectory(skillsRoot)) {
      const unreadable = (dir: string, error: Error): void =>
        skip('SKILL_FILE_INVALID', dir, new CatalogFileError(dir, 'unreadable directory', error));
      for (const file of listJsonFiles(skillsRoot, unreadable)) {
        const parsed = TaxonomyIndex.readJson(file);
        if (parsed instanceof CatalogFileError) {
          skip('SKILL_FILE_INVALID', file, parsed);
          continue;
        }
        const result = skillFileSchema.safeParse(parsed);
        if (!result.success) {
          skip('SKILL_FILE_INVALID', file, new CatalogFileError(file, describeZodError(result.error)));
          continue;
        }
        const { name, caption, uid } = result.data;
        const definition: SkillDefinition = { name, caption: caption ?? name, uid: uid ?? 0 };
        if (typeof result.data.extends === 'string' && result.data.extends.length > 0) {
          definition.extends = result.data.extends;
        }
        skills.set(name, Object.freeze(definition));
      }
    }

    const index = new TaxonomyIndex(skills, categories);
    log('taxonomy:loaded', { catalogRoot, ...index.stats(), warnings: warnings.length });
    return { index, warnings };
  }

  private static readJson(file: string): unknown {
    try {
      return JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      return new CatalogFileError(file, 'unreadable JSON', toError(error));
    }
  }

  getSkill(name: string): SkillDefinition | undefined {
    return this.skillsByName.get(name);
  }

  hasSkill(name: string): boolean {
    return this.skillsByName.has(name);
  }

  childrenOf(name: string): readonly string[] {
    return this.childrenByParent.get(name) ?? [];
  }

  isLeaf(name: string): boolean {
    return this.skillsByName.has(name) && this.childrenOf(name).length === 0;
  }

  /**
   * Leaf skills in lexicographic name order.
   */
  leaves(): SkillDefinition[] {
    const leaves: SkillDefinition[] = [];
    for (const name of this.leafNames) {
      const skill = this.skillsByName.get(name);
      if (skill) {
        leaves.push(skill);
      }
    }
    return leaves;
  }

  skills(): SkillDefinition[] {
    return [...this.skillsByName.values()];
  }

  categories(): CategoryMeta[] {
    return [...this.categoriesByKey.values()];
  }

  stats(): TaxonomyStats {
    return {
      skills: this.skillsByName.size,
      leaves: this.leafNames.length,
      categories: this.categoriesByKey.size,
    };
  }

  /**
   * Walk `extends` pointers upwards. Stops at the root sentinel, at a parent
   * that is not loaded, or at a name already visited (the starting skill
   * included). The category key is the top ancestor's name only when the
   * walk ended on the root sentinel.
   */
  ancestorChain(name: string): AncestorChain {
    const skill = this.skillsByName.get(name);
    if (!skill) {
      return { chain: [], categoryKey: null };
    }

    const chain: string[] = [];
    const visited = new Set<string>([skill.name]);
    let current = skill;
    while (current.extends !== undefined && current.extends !== ROOT_SKILL_SENTINEL) {
      const parentName = current.extends;
      if (visited.has(parentName)) {
        break;
      }
      const parent = this.skillsByName.get(parentName);
      if (!parent) {
        break;
      }
      visited.add(parentName);
      chain.push(parentName);
      current = parent;
    }

    const categoryKey = current.extends === ROOT_SKILL_SENTINEL ? current.name : null;
    return { chain, categoryKey };
  }

  category(key: string): CategoryMeta {
    return this.categoriesByKey.get(key) ?? { key, caption: key, uid: 0 };
  }

  /**
   * `root/.../skill` when the skill hangs off a category root, otherwise the
   * bare skill name.
   */
  qualifiedName(name: string): string {
    const { chain, categoryKey } = this.ancestorChain(name);
    if (categoryKey === null) {
      return name;
    }
    return [...chain].reverse().concat(name).join('/');
  }
}
