// Environment configuration loader for the organizer

import { LogLevel } from '../types';
import { DEFAULT_CONFIG_PATH, DEFAULT_LOG_CONFIG, ENV_VARS } from './constants';
import { isLogLevel } from './logger';

export interface EnvironmentConfig {
  configPath: string;
  logging: {
    level: LogLevel;
    filePath: string;
  };
}

export interface EnvironmentConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Load organizer settings from environment variables, falling back to defaults
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const level = env[ENV_VARS.LOG_LEVEL]?.toUpperCase();

  return {
    configPath: env[ENV_VARS.CONFIG_PATH] || DEFAULT_CONFIG_PATH,
    logging: {
      level: level && isLogLevel(level) ? level : DEFAULT_LOG_CONFIG.LEVEL,
      filePath: env[ENV_VARS.LOG_FILE_PATH] || DEFAULT_LOG_CONFIG.FILE_PATH,
    },
  };
}

/**
 * Report environment values that were set but could not be used
 */
export function validateEnvironmentConfig(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const level = env[ENV_VARS.LOG_LEVEL];
  if (level !== undefined && !isLogLevel(level.toUpperCase())) {
    warnings.push(`${ENV_VARS.LOG_LEVEL}=${level} is not one of ERROR, WARN, INFO, DEBUG; using ${DEFAULT_LOG_CONFIG.LEVEL}`);
  }

  const configPath = env[ENV_VARS.CONFIG_PATH];
  if (configPath !== undefined && configPath.trim().length === 0) {
    errors.push(`${ENV_VARS.CONFIG_PATH} is set but empty`);
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
