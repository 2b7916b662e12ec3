import { EventEmitter } from 'events';
import { TransferMode } from '../types';

export interface ProgressState {
  runId: string;
  directory: string;
  totalCandidates: number;
  processedFiles: number;
  organizedFiles: number;
  skippedFiles: number;
  currentFile?: string;
  startTime: Date;
  lastUpdateTime: Date;
  totalBytesProcessed: number;
}

export interface ProgressUpdate {
  type: 'start' | 'file' | 'skip' | 'complete';
  runId: string;
  fileName?: string;
  category?: string;
  mode?: TransferMode;
  destinationPath?: string;
  reason?: 'excluded' | 'failed';
  error?: Error;
  fileSize?: number;
  state: ProgressState;
  timestamp: Date;
}

/**
 * Reports the progress of organizer runs as `progress` events, so a hosting
 * interface can follow a run without reading the organizer's own state.
 */
export class ProgressTracker extends EventEmitter {
  private state?: ProgressState;

  public getState(): ProgressState | undefined {
    return this.state ? { ...this.state } : undefined;
  }

  public onProgress(listener: (update: ProgressUpdate) => void): () => void {
    this.on('progress', listener);
    return () => {
      this.off('progress', listener);
    };
  }

  public startRun(runId: string, directory: string, totalCandidates: number): void {
    const now = new Date();
    this.state = {
      runId,
      directory,
      totalCandidates,
      processedFiles: 0,
      organizedFiles: 0,
      skippedFiles: 0,
      startTime: now,
      lastUpdateTime: now,
      totalBytesProcessed: 0,
    };

    this.publish({ type: 'start' });
  }

  public fileOrganized(
    fileName: string,
    category: string,
    mode: TransferMode,
    destinationPath: string,
    fileSize: number
  ): void {
    const state = this.requireState();
    state.processedFiles++;
    state.organizedFiles++;
    state.totalBytesProcessed += fileSize;
    state.currentFile = fileName;

    this.publish({ type: 'file', fileName, category, mode, destinationPath, fileSize });
  }

  public fileSkipped(fileName: string, reason: 'excluded' | 'failed', error?: Error, fileSize = 0): void {
    const state = this.requireState();
    state.processedFiles++;
    state.skippedFiles++;
    state.totalBytesProcessed += fileSize;
    state.currentFile = fileName;

    this.publish({ type: 'skip', fileName, reason, error, fileSize });
  }

  public completeRun(): void {
    const state = this.requireState();
    state.currentFile = undefined;

    this.publish({ type: 'complete' });
  }

  public getProgressPercentage(): number {
    if (!this.state || this.state.totalCandidates === 0) {
      return this.state ? 100 : 0;
    }
    return Math.round((this.state.processedFiles / this.state.totalCandidates) * 100);
  }

  public getElapsedTime(): number {
    return this.state ? Date.now() - this.state.startTime.getTime() : 0;
  }

  private requireState(): ProgressState {
    if (!this.state) {
      throw new Error('No run in progress');
    }
    return this.state;
  }

  private publish(update: Omit<ProgressUpdate, 'runId' | 'state' | 'timestamp'>): void {
    const state = this.requireState();
    const now = new Date();
    state.lastUpdateTime = now;

    const event: ProgressUpdate = {
      ...update,
      runId: state.runId,
      state: { ...state },
      timestamp: now,
    };

    this.emit('progress', event);
  }
}
