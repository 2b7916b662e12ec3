// Category rules and the extension classifier

import defaultCategoryTable from '../config/default-categories.json';
import { PathUtils } from '../services/local/path-utils';
import { OTHERS_CATEGORY } from './constants';
import {
  DuplicateCategoryError,
  IndexOutOfRangeError,
  InvalidCategoryError,
} from './errors';

export interface CategoryRule {
  readonly name: string;
  readonly extensions: readonly string[];
}

/**
 * Ordered list of rules. Order decides which category wins when an extension
 * is listed under more than one.
 */
export type CategoryRuleSet = readonly CategoryRule[];

/**
 * Lowercase an extension and give it exactly one leading dot.
 * `"JPG"`, `".jpg"` and `"..jpg"` all become `".jpg"`.
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase().replace(/^\.+/, '');
  return trimmed.length > 0 ? `.${trimmed}` : '';
}

/**
 * Parse comma-separated user input such as `"jpg, .PNG,, tiff"`.
 * Empty items and duplicates are dropped, order is kept.
 */
export function parseExtensionList(input: string | readonly string[]): string[] {
  const items = typeof input === 'string' ? input.split(',') : input;
  const extensions: string[] = [];

  for (const item of items) {
    const extension = normalizeExtension(item);
    if (extension && !extensions.includes(extension)) {
      extensions.push(extension);
    }
  }

  return extensions;
}

/**
 * Map a filename to the first category having a matching extension, or
 * `"Others"`. Matching is a case-insensitive suffix test, so multi-part
 * extensions like `.tar.gz` work as configured.
 */
export function classify(fileName: string, rules: CategoryRuleSet): string {
  const lowerName = fileName.toLowerCase();

  for (const rule of rules) {
    if (rule.extensions.some((extension) => lowerName.endsWith(extension.toLowerCase()))) {
      return rule.name;
    }
  }

  return OTHERS_CATEGORY;
}

export function getCategoryNames(rules: CategoryRuleSet): string[] {
  return rules.map((rule) => rule.name);
}

// Names that cannot be keys of the plain objects categories are counted and saved in
const RESERVED_CATEGORY_NAMES = new Set(['__proto__']);

function createRule(name: string, extensions: string | readonly string[]): CategoryRule {
  const trimmedName = name.trim();
  if (!trimmedName) {
    throw new InvalidCategoryError('Category name cannot be empty');
  }
  if (!PathUtils.isFilenameSafe(trimmedName) || RESERVED_CATEGORY_NAMES.has(trimmedName)) {
    throw new InvalidCategoryError(`Category name '${trimmedName}' is not a valid folder name`);
  }

  const parsed = parseExtensionList(extensions);
  if (parsed.length === 0) {
    throw new InvalidCategoryError(`Category '${trimmedName}' needs at least one extension`);
  }

  return Object.freeze({ name: trimmedName, extensions: Object.freeze(parsed) });
}

function assertIndex(rules: CategoryRuleSet, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= rules.length) {
    throw new IndexOutOfRangeError(index, rules.length);
  }
}

export function addCategory(
  rules: CategoryRuleSet,
  name: string,
  extensions: string | readonly string[]
): CategoryRuleSet {
  const rule = createRule(name, extensions);

  if (rule.name === OTHERS_CATEGORY || rules.some((existing) => existing.name === rule.name)) {
    throw new DuplicateCategoryError(rule.name);
  }

  return [...rules, rule];
}

/**
 * Replace the extensions of the category at `index`, keeping its position
 */
export function updateCategory(
  rules: CategoryRuleSet,
  index: number,
  extensions: string | readonly string[]
): CategoryRuleSet {
  assertIndex(rules, index);
  const updated = createRule(rules[index].name, extensions);
  return rules.map((rule, position) => (position === index ? updated : rule));
}

export function removeCategory(
  rules: CategoryRuleSet,
  index: number
): { rules: CategoryRuleSet; removed: CategoryRule } {
  assertIndex(rules, index);
  return {
    rules: rules.filter((_, position) => position !== index),
    removed: rules[index],
  };
}

/**
 * Build a rule set from a `{ category: extensions }` table; key order is rule order.
 * Duplicate names cannot occur in an object, so only names and extensions are checked.
 */
export function rulesFromTable(table: Record<string, readonly string[]>): CategoryRuleSet {
  return Object.entries(table).map(([name, extensions]) => createRule(name, extensions));
}

/**
 * Like rulesFromTable, but a category that is not valid is left out and
 * its reason returned instead of failing the whole table
 */
export function rulesFromTableSkippingInvalid(
  table: Record<string, readonly string[]>
): { rules: CategoryRuleSet; rejected: string[] } {
  const rules: CategoryRule[] = [];
  const rejected: string[] = [];

  for (const [name, extensions] of Object.entries(table)) {
    try {
      rules.push(createRule(name, extensions));
    } catch (error) {
      if (!(error instanceof InvalidCategoryError)) {
        throw error;
      }
      rejected.push(error.message);
    }
  }

  return { rules, rejected };
}

export function rulesToTable(rules: CategoryRuleSet): Record<string, string[]> {
  const table: Record<string, string[]> = {};
  for (const rule of rules) {
    table[rule.name] = [...rule.extensions];
  }
  return table;
}

export function createDefaultRules(): CategoryRuleSet {
  return rulesFromTable(defaultCategoryTable);
}
