// Last-in-first-out history of file transfers

import { Logger } from '../types';
import { OperationRecord } from '../services/local/types';
import { PathUtils } from '../services/local/path-utils';
import { describeError } from './errors';

/**
 * How a recorded transfer is reversed. FileTransfer implements this; tests can
 * substitute their own.
 */
export interface TransferReverser {
  restore(record: OperationRecord): Promise<void>;
  discard(record: OperationRecord): Promise<void>;
}

export class UndoStack {
  private readonly records: OperationRecord[] = [];
  private readonly reverser: TransferReverser;
  private readonly logger: Logger;

  constructor(reverser: TransferReverser, logger: Logger) {
    this.reverser = reverser;
    this.logger = logger;
  }

  recordOperation(record: OperationRecord): void {
    this.records.push(record);
  }

  /**
   * Reverse the most recent transfer.
   *
   * The record is popped before anything is attempted and is never pushed
   * back, so a failed undo is not retried. Returns false when there was
   * nothing to undo or the transfer could not be reversed.
   */
  async undoLast(): Promise<boolean> {
    const record = this.records.pop();
    if (!record) {
      this.logger.warn('No operations to undo');
      return false;
    }

    if (!(await PathUtils.pathExists(record.destinationPath))) {
      this.logger.warn(`Cannot undo ${record.kind}: ${record.destinationPath} no longer exists`);
      return false;
    }

    try {
      switch (record.kind) {
        case 'move':
          await this.reverser.restore(record);
          this.logger.info(`Undone move: ${record.destinationPath} -> ${record.sourcePath}`);
          break;
        case 'copy':
          await this.reverser.discard(record);
          this.logger.info(`Undone copy: Removed ${record.destinationPath}`);
          break;
      }
      return true;
    } catch (error) {
      this.logger.error(`Error undoing operation: ${describeError(error)}`, {
        kind: record.kind,
        destinationPath: record.destinationPath
      });
      return false;
    }
  }

  peek(): OperationRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /**
   * Records, oldest first
   */
  list(): OperationRecord[] {
    return [...this.records];
  }

  clear(): void {
    this.records.length = 0;
  }

  get size(): number {
    return this.records.length;
  }
}
