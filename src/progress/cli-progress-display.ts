import { ProgressTracker, ProgressUpdate } from './progress-tracker';
import { formatSize } from '../core/run-statistics';

export interface ProgressDisplayOptions {
  showDetails: boolean;
  barLength: number;
  write: (text: string) => void;
}

/**
 * Renders organizer progress on a terminal: a bar that is redrawn after every
 * file and, with `showDetails`, one line per organized or skipped file.
 */
export class CLIProgressDisplay {
  private readonly tracker: ProgressTracker;
  private readonly options: ProgressDisplayOptions;
  private unsubscribe?: () => void;

  constructor(tracker: ProgressTracker, options: Partial<ProgressDisplayOptions> = {}) {
    this.tracker = tracker;
    this.options = {
      showDetails: false,
      barLength: 30,
      write: (text) => process.stdout.write(text),
      ...options,
    };
  }

  public start(): void {
    this.unsubscribe = this.tracker.onProgress((update) => this.handleProgressUpdate(update));
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  private handleProgressUpdate(update: ProgressUpdate): void {
    switch (update.type) {
      case 'start':
        this.options.write(`Organizing ${update.state.totalCandidates} file(s) in ${update.state.directory}\n`);
        break;

      case 'file':
        if (this.options.showDetails && update.fileName && update.category) {
          const verb = update.mode === 'copy' ? 'Copied' : 'Moved';
          const sizeInfo = update.fileSize !== undefined ? ` (${formatSize(update.fileSize)})` : '';
          this.clearLine();
          this.options.write(`  ✓ ${verb} ${update.fileName} -> ${update.category}${sizeInfo}\n`);
        }
        break;

      case 'skip':
        if (this.options.showDetails && update.fileName) {
          const reason = update.reason === 'excluded' ? 'excluded' : (update.error?.message ?? 'failed');
          this.clearLine();
          this.options.write(`  ✗ Skipped ${update.fileName}: ${reason}\n`);
        }
        break;

      case 'complete':
        this.drawBar();
        this.options.write('\n');
        return;
    }

    if (update.type !== 'start') {
      this.drawBar();
    }
  }

  private drawBar(): void {
    const state = this.tracker.getState();
    if (!state) {
      return;
    }

    this.clearLine();
    this.options.write(`${this.createProgressBar()} ${state.processedFiles}/${state.totalCandidates}`);
  }

  private createProgressBar(): string {
    const percentage = this.tracker.getProgressPercentage();
    const filledLength = Math.round((percentage / 100) * this.options.barLength);
    const emptyLength = this.options.barLength - filledLength;

    return `[${'█'.repeat(filledLength)}${'░'.repeat(emptyLength)}] ${percentage}%`;
  }

  private clearLine(): void {
    this.options.write('\r\x1b[K');
  }
}
