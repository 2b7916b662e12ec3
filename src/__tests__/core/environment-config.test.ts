import { DEFAULT_CONFIG_PATH } from '../../core/constants';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../../core/environment-config';

describe('environment configuration', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(loadEnvironmentConfig({})).toEqual({
      configPath: DEFAULT_CONFIG_PATH,
      logging: { level: 'INFO', filePath: './file_organizer.log' },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadEnvironmentConfig({
      FILE_ORGANIZER_CONFIG: '/tmp/custom-config.json',
      LOG_LEVEL: 'debug',
      LOG_FILE_PATH: '/tmp/organizer.log',
    });

    expect(config).toEqual({
      configPath: '/tmp/custom-config.json',
      logging: { level: 'DEBUG', filePath: '/tmp/organizer.log' },
    });
  });

  it('should ignore an unknown log level', () => {
    expect(loadEnvironmentConfig({ LOG_LEVEL: 'verbose' }).logging.level).toBe('INFO');
  });

  it('should warn about an unknown log level and reject an empty config path', () => {
    const result = validateEnvironmentConfig({ LOG_LEVEL: 'verbose', FILE_ORGANIZER_CONFIG: ' ' });

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['FILE_ORGANIZER_CONFIG is set but empty']);
    expect(result.warnings).toEqual([
      'LOG_LEVEL=verbose is not one of ERROR, WARN, INFO, DEBUG; using INFO',
    ]);
  });

  it('should accept a clean environment', () => {
    expect(validateEnvironmentConfig({})).toEqual({ isValid: true, errors: [], warnings: [] });
  });
});
