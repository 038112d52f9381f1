import { LauncherError } from './LauncherError';

export class LaunchError extends LauncherError {
  label: string;
  errno: string | null;

  constructor(label: string, message: string, errno: string | null = null) {
    super('LAUNCH', message, { label, errno });
    this.label = label;
    this.errno = errno;
  }
}
