// Moves and copies single files into their category folder

import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { AsyncResult, Logger } from '../../types';
import { TransferFailedError, describeError } from '../../core/errors';
import { getSystemErrorCode } from '../../core/error-handler';
import { DirectoryManager } from './directory-manager';
import { PathUtils } from './path-utils';
import { OperationRecord, TransferRequest } from './types';

/**
 * Copy a file without overwriting the destination, then carry over its
 * timestamps and permission bits
 */
export async function copyFileWithMetadata(sourcePath: string, destinationPath: string): Promise<void> {
  await fs.copyFile(sourcePath, destinationPath, fsConstants.COPYFILE_EXCL);

  try {
    const stats = await fs.stat(sourcePath);
    await fs.utimes(destinationPath, stats.atime, stats.mtime);
    await fs.chmod(destinationPath, stats.mode & 0o7777);
  } catch (error) {
    await fs.rm(destinationPath, { force: true });
    throw error;
  }
}

/**
 * Rename a file, falling back to copy + delete when source and destination are
 * on different filesystems
 */
export async function moveFile(sourcePath: string, destinationPath: string): Promise<void> {
  try {
    await fs.rename(sourcePath, destinationPath);
    return;
  } catch (error) {
    if (getSystemErrorCode(error) !== 'EXDEV') {
      throw error;
    }
  }

  await copyFileWithMetadata(sourcePath, destinationPath);

  try {
    await fs.unlink(sourcePath);
  } catch (error) {
    // Leave the source in place rather than ending up with two copies
    await fs.rm(destinationPath, { force: true });
    throw error;
  }
}

/**
 * Executes one move or copy into a category folder and returns the record
 * needed to reverse it.
 */
export class FileTransfer {
  private readonly directoryManager: DirectoryManager;
  private readonly logger: Logger;

  constructor(directoryManager: DirectoryManager, logger: Logger) {
    this.directoryManager = directoryManager;
    this.logger = logger;
  }

  /**
   * Transfer `sourcePath` to `destinationDirectory/[dateBucket/]fileName`,
   * numbering the name when it is taken. OS failures are returned as
   * TransferFailedError, never thrown.
   */
  async execute(request: TransferRequest): AsyncResult<OperationRecord, TransferFailedError> {
    const { sourcePath, fileName, mode, dateBucket } = request;

    try {
      let targetDirectory = request.destinationDirectory;

      if (dateBucket) {
        const bucket = await this.directoryManager.ensureFolder(targetDirectory, dateBucket);
        if (!bucket.success || !bucket.directoryPath) {
          throw new Error(bucket.error ?? `Could not create date folder ${dateBucket}`);
        }
        targetDirectory = bucket.directoryPath;
      }

      const conflictResolution = await this.directoryManager.resolveFilePathConflict(targetDirectory, fileName);
      const destinationPath = conflictResolution.resolvedPath;

      if (conflictResolution.strategy !== 'original') {
        this.logger.info(`File conflict resolved using ${conflictResolution.strategy} strategy: "${fileName}" -> "${conflictResolution.finalName}"`);
      }

      if (mode === 'copy') {
        await copyFileWithMetadata(sourcePath, destinationPath);
        this.logger.info(`Copied: ${fileName} -> ${destinationPath}`);
      } else {
        await moveFile(sourcePath, destinationPath);
        this.logger.info(`Moved: ${fileName} -> ${destinationPath}`);
      }

      const details = { sourcePath, destinationPath, timestamp: new Date() };
      const record: OperationRecord = Object.freeze(
        mode === 'copy' ? { kind: 'copy' as const, ...details } : { kind: 'move' as const, ...details }
      );

      return { success: true, data: record };
    } catch (error) {
      this.logger.debug(`Transfer of ${fileName} failed: ${describeError(error)}`);
      return { success: false, error: new TransferFailedError(fileName, error) };
    }
  }

  /**
   * Move a previously transferred file back to where it came from
   */
  async restore(record: OperationRecord): Promise<void> {
    if (await PathUtils.pathExists(record.sourcePath)) {
      throw new Error(`Original location is occupied: ${record.sourcePath}`);
    }

    await fs.mkdir(path.dirname(record.sourcePath), { recursive: true });
    await moveFile(record.destinationPath, record.sourcePath);
    await this.directoryManager.removeCreatedEmptyFolders();
  }

  /**
   * Delete the duplicate created by a copy
   */
  async discard(record: OperationRecord): Promise<void> {
    await fs.unlink(record.destinationPath);
    await this.directoryManager.removeCreatedEmptyFolders();
  }
}
