import { ProgressTracker, ProgressUpdate } from '../../progress/progress-tracker';
import { CLIProgressDisplay } from '../../progress/cli-progress-display';

describe('ProgressTracker', () => {
  let tracker: ProgressTracker;
  let updates: ProgressUpdate[];

  beforeEach(() => {
    tracker = new ProgressTracker();
    updates = [];
    tracker.onProgress((update) => updates.push(update));
  });

  it('should have no state before a run starts', () => {
    expect(tracker.getState()).toBeUndefined();
    expect(tracker.getProgressPercentage()).toBe(0);
    expect(tracker.getElapsedTime()).toBe(0);
  });

  it('should emit start, file, skip and complete updates', () => {
    tracker.startRun('run-1', '/data/downloads', 2);
    tracker.fileOrganized('a.jpg', 'Photos', 'move', '/data/downloads/Photos/a.jpg', 100);
    tracker.fileSkipped('.hidden', 'excluded');
    tracker.completeRun();

    expect(updates.map((update) => update.type)).toEqual(['start', 'file', 'skip', 'complete']);
    expect(updates.every((update) => update.runId === 'run-1')).toBe(true);
    expect(updates[1]).toMatchObject({
      fileName: 'a.jpg',
      category: 'Photos',
      mode: 'move',
      destinationPath: '/data/downloads/Photos/a.jpg',
      fileSize: 100,
    });
    expect(updates[2]).toMatchObject({ fileName: '.hidden', reason: 'excluded' });
    expect(updates[3].state).toMatchObject({
      processedFiles: 2,
      organizedFiles: 1,
      skippedFiles: 1,
      totalBytesProcessed: 100,
      currentFile: undefined,
    });
  });

  it('should send a snapshot of the state with each update', () => {
    tracker.startRun('run-1', '/data', 1);
    tracker.fileOrganized('a.jpg', 'Photos', 'copy', '/data/Photos/a.jpg', 5);

    expect(updates[0].state.processedFiles).toBe(0);
    expect(updates[1].state.processedFiles).toBe(1);
  });

  it('should report the percentage of processed files', () => {
    tracker.startRun('run-1', '/data', 4);
    tracker.fileOrganized('a.jpg', 'Photos', 'move', '/data/Photos/a.jpg', 1);

    expect(tracker.getProgressPercentage()).toBe(25);
  });

  it('should report 100% for a run with nothing to do', () => {
    tracker.startRun('run-1', '/data', 0);

    expect(tracker.getProgressPercentage()).toBe(100);
  });

  it('should reject file updates outside a run', () => {
    expect(() => tracker.fileSkipped('a.txt', 'failed')).toThrow('No run in progress');
  });

  it('should stop notifying after unsubscribing', () => {
    const listener = jest.fn();
    const unsubscribe = tracker.onProgress(listener);
    unsubscribe();

    tracker.startRun('run-1', '/data', 0);

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('CLIProgressDisplay', () => {
  it('should print file lines and a progress bar when showing details', () => {
    const tracker = new ProgressTracker();
    const output: string[] = [];
    const display = new CLIProgressDisplay(tracker, {
      showDetails: true,
      barLength: 4,
      write: (text) => output.push(text),
    });
    display.start();

    tracker.startRun('run-1', '/data', 2);
    tracker.fileOrganized('a.jpg', 'Photos', 'move', '/data/Photos/a.jpg', 2048);
    tracker.fileSkipped('.hidden', 'excluded');
    tracker.completeRun();
    display.stop();
    tracker.startRun('run-2', '/data', 1);

    expect(output).toEqual([
      'Organizing 2 file(s) in /data\n',
      '\r\x1b[K',
      '  ✓ Moved a.jpg -> Photos (2.00 KB)\n',
      '\r\x1b[K',
      '[██░░] 50% 1/2',
      '\r\x1b[K',
      '  ✗ Skipped .hidden: excluded\n',
      '\r\x1b[K',
      '[████] 100% 2/2',
      '\r\x1b[K',
      '[████] 100% 2/2',
      '\n',
    ]);
  });

  it('should only draw the bar without details', () => {
    const tracker = new ProgressTracker();
    const output: string[] = [];
    const display = new CLIProgressDisplay(tracker, { barLength: 2, write: (text) => output.push(text) });
    display.start();

    tracker.startRun('run-1', '/data', 1);
    tracker.fileSkipped('a.txt', 'failed', new Error('EACCES: permission denied'));

    expect(output).toEqual(['Organizing 1 file(s) in /data\n', '\r\x1b[K', '[██] 100% 1/1']);
  });
});
