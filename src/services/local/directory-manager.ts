// Local directory manager for category folders and candidate scanning

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { Logger } from '../../types';
import { DirectoryNotAccessibleError, describeError } from '../../core/errors';
import { getSystemErrorCode } from '../../core/error-handler';
import { CandidateFile, ConflictResolutionResult, DirectoryCreateResult } from './types';
import { PathUtils } from './path-utils';

/**
 * Creates category and date folders inside the directory being organized and
 * lists the files a run should consider.
 */
export class DirectoryManager {
  private readonly logger: Logger;
  private readonly createdFolders = new Set<string>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Ensure `directory` exists, is a directory and can be read and written.
   * Throws DirectoryNotAccessibleError otherwise.
   */
  async assertAccessible(directory: string): Promise<void> {
    const stats = await fs.stat(directory).catch((error: unknown) => {
      throw new DirectoryNotAccessibleError(directory, error);
    });

    if (!stats.isDirectory()) {
      throw new DirectoryNotAccessibleError(directory, new Error('not a directory'));
    }

    try {
      await fs.access(directory, fsConstants.R_OK | fsConstants.W_OK | fsConstants.X_OK);
    } catch (error) {
      throw new DirectoryNotAccessibleError(directory, error);
    }
  }

  /**
   * Create a folder directly inside `parentDirectory` unless it already exists
   */
  async ensureFolder(parentDirectory: string, folderName: string): Promise<DirectoryCreateResult> {
    const targetPath = path.join(parentDirectory, folderName);

    try {
      const existed = await PathUtils.pathExists(targetPath);
      if (!existed) {
        const firstCreated = await fs.mkdir(targetPath, { recursive: true });
        this.trackCreated(firstCreated ?? targetPath, targetPath);
        this.logger.debug(`Created folder: ${targetPath}`);
      }

      // Verify it is usable as a folder
      const stats = await fs.stat(targetPath);
      if (!stats.isDirectory()) {
        return {
          success: false,
          directoryPath: targetPath,
          error: `Path exists but is not a directory: ${targetPath}`
        };
      }

      return {
        success: true,
        directoryPath: targetPath,
        created: !existed
      };
    } catch (error) {
      const errorMessage = `Failed to create folder '${folderName}': ${describeError(error)}`;
      this.logger.error(errorMessage);

      return {
        success: false,
        directoryPath: targetPath,
        error: errorMessage
      };
    }
  }

  /**
   * Create one folder per category. Failures are logged and returned, not thrown;
   * files bound for a missing folder fail individually later.
   */
  async ensureCategoryFolders(directory: string, categories: readonly string[]): Promise<DirectoryCreateResult[]> {
    const results: DirectoryCreateResult[] = [];

    for (const category of categories) {
      results.push(await this.ensureFolder(directory, category));
    }

    return results;
  }

  /**
   * Folders this manager has created and not removed since, deepest first
   */
  getCreatedFolders(): string[] {
    return [...this.createdFolders].sort((a, b) => b.length - a.length);
  }

  /**
   * Remove the folders this manager created that are empty now, deepest
   * first. Folders it did not create are never touched. Returns the paths
   * that were removed.
   */
  async removeCreatedEmptyFolders(): Promise<string[]> {
    const removed: string[] = [];

    for (const directory of this.getCreatedFolders()) {
      const outcome = await this.removeIfEmpty(directory);
      if (outcome !== 'kept') {
        this.createdFolders.delete(directory);
      }
      if (outcome === 'removed') {
        removed.push(directory);
      }
    }

    return removed;
  }

  /**
   * Pick a destination path in `directoryPath` that does not exist yet
   */
  async resolveFilePathConflict(directoryPath: string, fileName: string): Promise<ConflictResolutionResult> {
    const finalName = await PathUtils.createUniqueFileName(directoryPath, fileName);

    if (finalName !== fileName) {
      this.logger.debug(`File conflict detected: ${path.join(directoryPath, fileName)}`);
    }

    return {
      resolvedPath: path.join(directoryPath, finalName),
      strategy: finalName === fileName ? 'original' : 'numbered',
      finalName
    };
  }

  /**
   * List the regular files at the top level of `directory`, sorted by name.
   * Subdirectories are never descended into; `shouldIgnore` drops entries
   * before they are stat'ed.
   */
  async listCandidateFiles(
    directory: string,
    shouldIgnore: (fileName: string) => boolean = () => false
  ): Promise<CandidateFile[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      throw new DirectoryNotAccessibleError(directory, error);
    });

    const candidates: CandidateFile[] = [];
    const names = entries
      .filter((entry) => !entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    for (const name of names) {
      if (shouldIgnore(name)) {
        continue;
      }

      const filePath = path.join(directory, name);
      try {
        // stat follows symlinks; links to directories are skipped like directories
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
          continue;
        }

        candidates.push({
          name,
          path: filePath,
          size: stats.size,
          modifiedAt: stats.mtime
        });
      } catch (error) {
        this.logger.warn(`Failed to read directory entry: ${filePath} - ${describeError(error)}`);
      }
    }

    return candidates;
  }

  /**
   * Remember `deepest` and every parent up to `topmost`, all created by one mkdir
   */
  private trackCreated(topmost: string, deepest: string): void {
    const top = path.resolve(topmost);
    let current = path.resolve(deepest);

    while (current !== top && current.startsWith(top + path.sep)) {
      this.createdFolders.add(current);
      current = path.dirname(current);
    }
    this.createdFolders.add(top);
  }

  private async removeIfEmpty(directory: string): Promise<'removed' | 'kept' | 'missing'> {
    try {
      const entries = await fs.readdir(directory);
      if (entries.length > 0) {
        return 'kept';
      }

      await fs.rmdir(directory);
      this.logger.debug(`Removed empty folder: ${directory}`);
      return 'removed';
    } catch (error) {
      if (getSystemErrorCode(error) === 'ENOENT') {
        return 'missing';
      }
      this.logger.warn(`Could not remove folder: ${directory} - ${describeError(error)}`);
      return 'kept';
    }
  }
}
