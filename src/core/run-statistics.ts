// Statistics for one organizer run and their text summary

import { OTHERS_CATEGORY, SIZE_UNITS } from './constants';

export interface RunStatistics {
  totalFiles: number;
  organizedFiles: number;
  skippedFiles: number;
  totalSizeBytes: number;
  perCategoryCount: Record<string, number>;
}

/**
 * Zeroed statistics with a counter for every category plus "Others", in rule order
 */
export function createEmptyStatistics(categoryNames: readonly string[]): RunStatistics {
  const perCategoryCount: Record<string, number> = {};
  for (const name of [...categoryNames, OTHERS_CATEGORY]) {
    perCategoryCount[name] = 0;
  }

  return {
    totalFiles: 0,
    organizedFiles: 0,
    skippedFiles: 0,
    totalSizeBytes: 0,
    perCategoryCount,
  };
}

export function cloneStatistics(stats: RunStatistics): RunStatistics {
  return { ...stats, perCategoryCount: { ...stats.perCategoryCount } };
}

/**
 * Human-readable byte size with two decimals, stepping by 1024 up to GB.
 * GB is never exceeded: 5 TiB is "5120.00 GB".
 */
export function formatSize(sizeBytes: number): string {
  let size = sizeBytes;

  for (const unit of SIZE_UNITS) {
    if (size < 1024 || unit === 'GB') {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }

  // SIZE_UNITS always ends with GB
  return `${size.toFixed(2)} GB`;
}

export function formatSummary(stats: RunStatistics): string {
  let summary = 'Organization Summary:\n';
  summary += `Total files processed: ${stats.totalFiles}\n`;
  summary += `Files organized: ${stats.organizedFiles}\n`;
  summary += `Files skipped: ${stats.skippedFiles}\n`;
  summary += `Total size processed: ${formatSize(stats.totalSizeBytes)}\n\n`;

  summary += 'Files by category:\n';
  for (const [category, count] of Object.entries(stats.perCategoryCount)) {
    if (count > 0) {
      summary += `  - ${category}: ${count}\n`;
    }
  }

  return summary;
}
