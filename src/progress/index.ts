export { ProgressTracker, ProgressState, ProgressUpdate } from './progress-tracker';
export { CLIProgressDisplay, ProgressDisplayOptions } from './cli-progress-display';
