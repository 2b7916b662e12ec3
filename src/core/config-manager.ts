// Organizer configuration: category rules and exclusion patterns

import * as fs from 'fs';
import * as path from 'path';
import { ConfigValidationResult, Logger } from '../types';
import { CategoryRuleSet, createDefaultRules, rulesFromTableSkippingInvalid, rulesToTable } from './category-rules';
import { ConfigLoadError, ConfigSaveError, describeError } from './errors';
import { validatePattern } from './exclusion-filter';

export interface OrganizerConfig {
  categories: CategoryRuleSet;
  excludedPatterns: string[];
}

/**
 * On-disk shape. `file_types` key order is the category order.
 */
export interface PersistedConfig {
  file_types: Record<string, string[]>;
  excluded_patterns: string[];
}

export interface ConfigLoadResult {
  config: OrganizerConfig;
  source: 'file' | 'defaults';
  warnings: string[];
  error?: ConfigLoadError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export class OrganizerConfigManager {
  /**
   * Built-in category table with no exclusions
   */
  static createDefault(): OrganizerConfig {
    return {
      categories: createDefaultRules(),
      excludedPatterns: [],
    };
  }

  static mergeWithDefaults(userConfig: Partial<OrganizerConfig>): OrganizerConfig {
    const defaultConfig = OrganizerConfigManager.createDefault();
    return {
      categories: userConfig.categories ?? defaultConfig.categories,
      excludedPatterns: [...(userConfig.excludedPatterns ?? defaultConfig.excludedPatterns)],
    };
  }

  /**
   * Check a parsed JSON document against the persisted shape
   */
  static validateConfig(value: unknown): ConfigValidationResult {
    const errors: string[] = [];

    if (!isRecord(value)) {
      return { isValid: false, errors: ['Configuration must be a JSON object'] };
    }

    if (value.file_types !== undefined) {
      if (!isRecord(value.file_types)) {
        errors.push('file_types must be an object mapping category names to extension lists');
      } else {
        for (const [category, extensions] of Object.entries(value.file_types)) {
          if (!isStringArray(extensions)) {
            errors.push(`Extensions for category '${category}' must be a list of strings`);
          }
        }
      }
    }

    if (value.excluded_patterns !== undefined && !isStringArray(value.excluded_patterns)) {
      errors.push('excluded_patterns must be a list of strings');
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }

  /**
   * Export configuration to JSON string
   */
  static exportConfig(config: OrganizerConfig): string {
    const persisted: PersistedConfig = {
      file_types: rulesToTable(config.categories),
      excluded_patterns: [...config.excludedPatterns],
    };
    return JSON.stringify(persisted, null, 4);
  }

  /**
   * Parse a configuration document. Categories that are not valid and
   * patterns that do not compile are dropped and reported in `warnings`;
   * anything else invalid throws.
   */
  static importConfig(configJson: string): { config: OrganizerConfig; warnings: string[] } {
    const parsed: unknown = JSON.parse(configJson);
    const validation = OrganizerConfigManager.validateConfig(parsed);
    if (!validation.isValid || !isRecord(parsed)) {
      throw new Error(validation.errors.join('; '));
    }

    const warnings: string[] = [];
    const fileTypes = parsed.file_types;
    let categories: CategoryRuleSet | undefined;
    if (isRecord(fileTypes)) {
      const table = Object.fromEntries(
        Object.entries(fileTypes).flatMap(([category, extensions]) =>
          isStringArray(extensions) ? [[category, extensions] as const] : []
        )
      );
      const { rules, rejected } = rulesFromTableSkippingInvalid(table);
      categories = rules;
      warnings.push(...rejected.map((reason) => `Ignoring configured category: ${reason}`));
    }

    const excludedPatterns: string[] = [];
    if (isStringArray(parsed.excluded_patterns)) {
      for (const pattern of parsed.excluded_patterns) {
        try {
          validatePattern(pattern);
          excludedPatterns.push(pattern);
        } catch (error) {
          warnings.push(`Ignoring configured exclude pattern: ${describeError(error)}`);
        }
      }
    }

    return {
      config: OrganizerConfigManager.mergeWithDefaults({ categories, excludedPatterns }),
      warnings,
    };
  }

  /**
   * Load configuration from file. A missing file yields the defaults; an
   * unreadable or malformed one yields the defaults plus a ConfigLoadError.
   */
  static async loadConfigFromFile(filePath: string, logger?: Logger): Promise<ConfigLoadResult> {
    if (!fs.existsSync(filePath)) {
      logger?.info(`No configuration file at ${filePath}, using defaults`);
      return { config: OrganizerConfigManager.createDefault(), source: 'defaults', warnings: [] };
    }

    try {
      const configJson = await fs.promises.readFile(filePath, 'utf8');
      const { config, warnings } = OrganizerConfigManager.importConfig(configJson);

      for (const warning of warnings) {
        logger?.warn(warning);
      }
      logger?.info('Configuration loaded successfully', { filePath });

      return { config, source: 'file', warnings };
    } catch (error) {
      const loadError = new ConfigLoadError(filePath, error);
      logger?.error(`Error loading configuration: ${loadError.message}`);

      return {
        config: OrganizerConfigManager.createDefault(),
        source: 'defaults',
        warnings: [],
        error: loadError,
      };
    }
  }

  /**
   * Save configuration to file, creating its directory when needed
   */
  static async saveConfigToFile(config: OrganizerConfig, filePath: string, logger?: Logger): Promise<void> {
    try {
      const configJson = OrganizerConfigManager.exportConfig(config);
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      await fs.promises.writeFile(filePath, configJson, 'utf8');
      logger?.info('Configuration saved successfully', { filePath });
    } catch (error) {
      const saveError = new ConfigSaveError(filePath, error);
      logger?.error(`Error saving configuration: ${saveError.message}`);
      throw saveError;
    }
  }

  static getConfigSummary(config: OrganizerConfig): Record<string, string | number> {
    return {
      Categories: config.categories.length,
      'Exclude Patterns': config.excludedPatterns.length,
    };
  }
}
