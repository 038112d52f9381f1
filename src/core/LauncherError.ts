export type LauncherErrorCode = 'CONFIG' | 'PRECONDITION' | 'LAUNCH' | 'ABORTED';

export class LauncherError extends Error {
  code: LauncherErrorCode;
  details: Record<string, unknown>;

  constructor(code: LauncherErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}
