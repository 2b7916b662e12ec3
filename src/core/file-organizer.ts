// Organizer: classifies the files of a directory into category folders

import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Logger, RunOptions } from '../types';
import { DirectoryManager } from '../services/local/directory-manager';
import { FileTransfer } from '../services/local/file-transfer';
import { PathUtils } from '../services/local/path-utils';
import { OperationRecord } from '../services/local/types';
import { ProgressTracker } from '../progress/progress-tracker';
import {
  CategoryRule,
  CategoryRuleSet,
  addCategory,
  classify,
  getCategoryNames,
  removeCategory,
  updateCategory,
} from './category-rules';
import { OrganizerConfig, OrganizerConfigManager } from './config-manager';
import { CONFIG_FILE_NAME, LOG_FILE_PATTERN, OTHERS_CATEGORY } from './constants';
import { ErrorHandler } from './error-handler';
import { ConfigSaveError, InvalidPatternError } from './errors';
import { ExclusionFilter } from './exclusion-filter';
import { ConsoleLogger } from './logger';
import { RunStatistics, cloneStatistics, createEmptyStatistics, formatSummary } from './run-statistics';
import { UndoStack } from './undo-stack';

export interface FileOrganizerOptions {
  config?: OrganizerConfig;
  /** Where pattern changes and saveConfig() write to; nothing is persisted without it */
  configPath?: string;
  logger?: Logger;
  progressTracker?: ProgressTracker;
}

/**
 * Owns the category rules, exclusion patterns, undo history and statistics of
 * one organizer session. Runs are processed one file at a time.
 */
export class FileOrganizer {
  private readonly logger: Logger;
  private readonly configPath?: string;
  private readonly directoryManager: DirectoryManager;
  private readonly fileTransfer: FileTransfer;
  private readonly errorHandler: ErrorHandler;
  private readonly undoStack: UndoStack;
  private readonly exclusionFilter: ExclusionFilter;
  private categories: CategoryRuleSet;
  private statistics: RunStatistics;
  private isRunning = false;

  readonly progress: ProgressTracker;

  constructor(options: FileOrganizerOptions = {}) {
    const config = options.config ?? OrganizerConfigManager.createDefault();

    this.logger = options.logger ?? new ConsoleLogger('WARN');
    this.configPath = options.configPath;
    this.directoryManager = new DirectoryManager(this.logger);
    this.fileTransfer = new FileTransfer(this.directoryManager, this.logger);
    this.errorHandler = new ErrorHandler(this.logger);
    this.undoStack = new UndoStack(this.fileTransfer, this.logger);
    this.exclusionFilter = new ExclusionFilter(config.excludedPatterns);
    this.categories = config.categories;
    this.statistics = createEmptyStatistics(getCategoryNames(this.categories));
    this.progress = options.progressTracker ?? new ProgressTracker();
  }

  /**
   * Load configuration from `configPath` (defaults when it is missing or
   * unreadable) and create an organizer bound to that file
   */
  static async create(options: Omit<FileOrganizerOptions, 'config'> & { configPath: string }): Promise<FileOrganizer> {
    const loaded = await OrganizerConfigManager.loadConfigFromFile(options.configPath, options.logger);
    return new FileOrganizer({ ...options, config: loaded.config });
  }

  /**
   * Organize the top level of `directory`.
   *
   * Throws DirectoryNotAccessibleError before touching anything when the
   * directory cannot be used. Files that fail to transfer are counted as
   * skipped and the run continues.
   */
  async run(directory: string, options: Partial<RunOptions> = {}): Promise<RunStatistics> {
    if (this.isRunning) {
      throw new Error('An organize run is already in progress');
    }

    const organizeByDate = options.organizeByDate ?? false;
    const mode = options.copyInsteadOfMove ? 'copy' : 'move';
    const runId = uuidv4();

    this.isRunning = true;
    try {
      try {
        await this.directoryManager.assertAccessible(directory);
      } catch (error) {
        this.errorHandler.handleError(error, { operation: 'organize', directory, timestamp: new Date() });
        throw error;
      }

      const categoryNames = getCategoryNames(this.categories);
      const candidates = await this.directoryManager.listCandidateFiles(directory, (name) =>
        this.isOperationalFile(name)
      );

      this.statistics = createEmptyStatistics(categoryNames);
      this.logger.info('Organization started', { runId, directory, organizeByDate, mode });
      this.progress.startRun(runId, directory, candidates.length);

      await this.directoryManager.ensureCategoryFolders(directory, [
        ...categoryNames,
        OTHERS_CATEGORY,
      ]);

      for (const file of candidates) {
        if (this.exclusionFilter.matches(file.name)) {
          this.statistics.skippedFiles++;
          this.logger.info(`Skipped file (excluded pattern): ${file.name}`);
          this.progress.fileSkipped(file.name, 'excluded');
          continue;
        }

        this.statistics.totalFiles++;
        this.statistics.totalSizeBytes += file.size;

        const category = classify(file.name, this.categories);
        const result = await this.fileTransfer.execute({
          sourcePath: file.path,
          destinationDirectory: path.join(directory, category),
          fileName: file.name,
          mode,
          dateBucket: organizeByDate ? PathUtils.formatDateBucket(file.modifiedAt) : undefined,
        });

        if (!result.success) {
          this.statistics.skippedFiles++;
          this.errorHandler.handleError(result.error, {
            operation: mode,
            fileName: file.name,
            filePath: file.path,
            timestamp: new Date(),
          });
          this.progress.fileSkipped(file.name, 'failed', result.error, file.size);
          continue;
        }

        this.undoStack.recordOperation(result.data);
        this.statistics.organizedFiles++;
        this.statistics.perCategoryCount[category] = (this.statistics.perCategoryCount[category] ?? 0) + 1;
        this.progress.fileOrganized(file.name, category, mode, result.data.destinationPath, file.size);
      }

      this.logger.info('Organization complete', {
        runId,
        totalFiles: this.statistics.totalFiles,
        organizedFiles: this.statistics.organizedFiles,
        skippedFiles: this.statistics.skippedFiles,
      });
      this.progress.completeRun();

      return cloneStatistics(this.statistics);
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Reverse the most recent transfer from any run of this session. Folders
   * created by this organizer that are left empty afterwards are removed.
   */
  async undoLast(): Promise<boolean> {
    return this.undoStack.undoLast();
  }

  canUndo(): boolean {
    return this.undoStack.size > 0;
  }

  getUndoHistory(): OperationRecord[] {
    return this.undoStack.list();
  }

  /**
   * Add an exclusion pattern and persist the configuration.
   * Returns false, leaving the patterns unchanged, when it does not compile.
   */
  async addExcludePattern(pattern: string): Promise<boolean> {
    try {
      this.exclusionFilter.addPattern(pattern);
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        this.errorHandler.handleError(error, { operation: 'add_exclude_pattern', timestamp: new Date() });
        return false;
      }
      throw error;
    }

    this.logger.info(`Added exclude pattern: ${pattern}`);
    await this.persistAfterChange('add_exclude_pattern');
    return true;
  }

  /**
   * Remove the pattern at a zero-based position, persist, and return it.
   * Throws IndexOutOfRangeError for a bad position.
   */
  async removeExcludePattern(index: number): Promise<string> {
    const removed = this.exclusionFilter.removePattern(index);
    this.logger.info(`Removed exclude pattern: ${removed}`);
    await this.persistAfterChange('remove_exclude_pattern');
    return removed;
  }

  listExcludePatterns(): string[] {
    return this.exclusionFilter.list();
  }

  listCategories(): CategoryRuleSet {
    return this.categories;
  }

  addCategory(name: string, extensions: string | readonly string[]): CategoryRule {
    this.categories = addCategory(this.categories, name, extensions);
    const added = this.categories[this.categories.length - 1];
    this.logger.info(`Added category: ${added.name}`, { extensions: [...added.extensions] });
    return added;
  }

  updateCategory(index: number, extensions: string | readonly string[]): CategoryRule {
    this.categories = updateCategory(this.categories, index, extensions);
    const updated = this.categories[index];
    this.logger.info(`Updated category: ${updated.name}`, { extensions: [...updated.extensions] });
    return updated;
  }

  removeCategory(index: number): CategoryRule {
    const { rules, removed } = removeCategory(this.categories, index);
    this.categories = rules;
    this.logger.info(`Removed category: ${removed.name}`);
    return removed;
  }

  getConfig(): OrganizerConfig {
    return {
      categories: this.categories,
      excludedPatterns: this.exclusionFilter.list(),
    };
  }

  getConfigPath(): string | undefined {
    return this.configPath;
  }

  /**
   * Write categories and patterns to the configuration file.
   * Throws ConfigSaveError when it cannot be written.
   */
  async saveConfig(): Promise<void> {
    if (!this.configPath) {
      this.logger.debug('No configuration file set, nothing saved');
      return;
    }
    await OrganizerConfigManager.saveConfigToFile(this.getConfig(), this.configPath, this.logger);
  }

  getLastStatistics(): RunStatistics {
    return cloneStatistics(this.statistics);
  }

  getSummaryText(): string {
    return formatSummary(this.statistics);
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  /**
   * Log files, rotated ones included, and the organizer's own configuration
   * file stay where they are
   */
  private isOperationalFile(fileName: string): boolean {
    if (LOG_FILE_PATTERN.test(fileName)) {
      return true;
    }

    const configName = this.configPath ? path.basename(this.configPath) : CONFIG_FILE_NAME;
    return fileName === configName || fileName === CONFIG_FILE_NAME;
  }

  private async persistAfterChange(operation: string): Promise<void> {
    try {
      await this.saveConfig();
    } catch (error) {
      // The in-memory change stands; the failure is logged and counted
      if (error instanceof ConfigSaveError) {
        this.errorHandler.handleError(error, { operation, timestamp: new Date() });
        return;
      }
      throw error;
    }
  }
}
