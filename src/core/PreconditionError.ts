import { LauncherError } from './LauncherError';

// A required filesystem path is missing. Raised before anything is spawned.
export class PreconditionError extends LauncherError {
  path: string;

  constructor(path: string, message: string) {
    super('PRECONDITION', message, { path });
    this.path = path;
  }
}
