// Main entry point for the file organizer library

export * from './types';
export * from './core';
export * from './progress';

export { DirectoryManager } from './services/local/directory-manager';
export { FileTransfer, copyFileWithMetadata, moveFile } from './services/local/file-transfer';
export { PathUtils } from './services/local/path-utils';
export type {
  CandidateFile,
  CopyRecord,
  MoveRecord,
  OperationRecord,
  TransferRequest,
} from './services/local/types';
