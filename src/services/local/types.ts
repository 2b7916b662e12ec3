// Local file management types and interfaces

import { TransferMode } from '../../types';

interface OperationRecordBase {
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly timestamp: Date;
}

export interface MoveRecord extends OperationRecordBase {
  readonly kind: 'move';
}

export interface CopyRecord extends OperationRecordBase {
  readonly kind: 'copy';
}

/**
 * Everything needed to reverse one transfer. `destinationPath` is the final
 * path after conflict resolution.
 */
export type OperationRecord = MoveRecord | CopyRecord;

export interface CandidateFile {
  name: string;
  path: string;
  size: number;
  modifiedAt: Date;
}

export interface DirectoryCreateResult {
  success: boolean;
  directoryPath?: string;
  created?: boolean; // true if created, false if already existed
  error?: string;
}

export interface ConflictResolutionResult {
  resolvedPath: string;
  strategy: 'original' | 'numbered';
  finalName: string;
}

export interface TransferRequest {
  sourcePath: string;
  destinationDirectory: string;
  fileName: string;
  mode: TransferMode;
  dateBucket?: string;
}
