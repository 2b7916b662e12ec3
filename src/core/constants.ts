// Core constants and configuration defaults

import * as path from 'path';

/** Category for files no rule matches */
export const OTHERS_CATEGORY = 'Others';

export const CONFIG_FILE_NAME = 'organizer-config.json';

/** Package root, one level above src/ (or dist/) */
const PACKAGE_ROOT = path.resolve(__dirname, '..', '..');

export const DEFAULT_CONFIG_PATH = path.join(PACKAGE_ROOT, CONFIG_FILE_NAME);

export const DEFAULT_LOG_CONFIG = {
  FILE_PATH: './file_organizer.log',
  LEVEL: 'INFO' as const,
  MAX_FILE_SIZE: 10 * 1024 * 1024, // 10MB
  MAX_FILES: 5,
};

/** Operational logs and their rotations (`x.log`, `x.log.1`, ...) are never organized */
export const LOG_FILE_PATTERN = /\.log(\.\d+)?$/i;

export const ENV_VARS = {
  CONFIG_PATH: 'FILE_ORGANIZER_CONFIG',
  LOG_LEVEL: 'LOG_LEVEL',
  LOG_FILE_PATH: 'LOG_FILE_PATH',
} as const;

export const SIZE_UNITS = Object.freeze(['B', 'KB', 'MB', 'GB'] as const);
