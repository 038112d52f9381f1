import { LauncherError } from './LauncherError';
import type { LaunchResult } from './LaunchSpec';

export class SequenceAbortedError extends LauncherError {
  label: string;
  results: LaunchResult[];
  failure: LauncherError;

  constructor(label: string, results: LaunchResult[], failure: LauncherError) {
    super('ABORTED', `Critical process "${label}" failed to launch: ${failure.message}`, { label });
    this.label = label;
    this.results = results;
    this.failure = failure;
  }
}
