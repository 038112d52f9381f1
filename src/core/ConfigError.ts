import { LauncherError } from './LauncherError';

export class ConfigError extends LauncherError {
  option: string;

  constructor(option: string, message: string) {
    super('CONFIG', message, { option });
    this.option = option;
  }
}
