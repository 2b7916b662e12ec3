// Organizer core module
export * from './constants';
export * from './errors';
export * from './logger';
export * from './error-handler';
export * from './category-rules';
export * from './exclusion-filter';
export * from './run-statistics';
export * from './undo-stack';
export * from './config-manager';
export * from './environment-config';
export * from './file-organizer';
