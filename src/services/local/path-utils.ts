// Path utilities for destination naming and date buckets

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Characters reserved by at least one common filesystem
 */
const FILESYSTEM_RESERVED_CHARS = /[<>:"|?*\/\\\x00-\x1f]/;

/**
 * Maximum filename length (conservative across platforms)
 */
const MAX_FILENAME_LENGTH = 255;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export class PathUtils {
  /**
   * Split a filename into base and last extension, the way `path.extname`
   * sees it: `report.tar.gz` -> `report.tar` + `.gz`, `.env` -> `.env` + ``.
   */
  static splitFileName(fileName: string): { base: string; extension: string } {
    const extension = path.extname(fileName);
    return {
      base: extension ? fileName.slice(0, -extension.length) : fileName,
      extension,
    };
  }

  /**
   * `photo.jpg` with counter 2 -> `photo_2.jpg`
   */
  static numberedFileName(fileName: string, counter: number): string {
    const { base, extension } = PathUtils.splitFileName(fileName);
    return `${base}_${counter}${extension}`;
  }

  static async pathExists(filePath: string): Promise<boolean> {
    try {
      await fs.lstat(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Find the first free name in `directory`, starting with `fileName` itself and
   * then trying `base_1.ext`, `base_2.ext`, ...
   */
  static async createUniqueFileName(directory: string, fileName: string): Promise<string> {
    if (!(await PathUtils.pathExists(path.join(directory, fileName)))) {
      return fileName;
    }

    let counter = 1;
    let candidate = PathUtils.numberedFileName(fileName, counter);

    while (await PathUtils.pathExists(path.join(directory, candidate))) {
      counter++;
      candidate = PathUtils.numberedFileName(fileName, counter);
    }

    return candidate;
  }

  /**
   * Calendar date of a timestamp in local time, formatted `YYYY-MM-DD`
   */
  static formatDateBucket(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  }

  /**
   * Validate if a name can be used as a single file or folder name.
   * Checks for reserved characters, relative segments and length limits.
   */
  static isFilenameSafe(fileName: string): boolean {
    if (!fileName || fileName.length === 0) {
      return false;
    }

    if (fileName === '.' || fileName === '..') {
      return false;
    }

    if (FILESYSTEM_RESERVED_CHARS.test(fileName)) {
      return false;
    }

    return fileName.length <= MAX_FILENAME_LENGTH;
  }
}
