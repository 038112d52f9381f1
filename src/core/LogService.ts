import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';

export const sanitizeLabel = (label: string): string => {
  const slug = label
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'process';
};

export class LogService {
  constructor(private readonly logDir: string) {}

  getLogPath(label: string): string {
    return path.join(this.logDir, `${sanitizeLabel(label)}.log`);
  }

  async appendLog(label: string, chunk: string): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    await fs.appendFile(this.getLogPath(label), chunk, 'utf-8');
  }

  // The returned handle's fd is handed to the child as stdout/stderr.
  async openChildLog(label: string): Promise<FileHandle> {
    await fs.mkdir(this.logDir, { recursive: true });
    const handle = await fs.open(this.getLogPath(label), 'a');
    await handle.appendFile(`\n[${new Date().toISOString()}] [launcher] starting ${label}\n`, 'utf-8');
    return handle;
  }

  async readTail(label: string, lines: number): Promise<string> {
    const filePath = this.getLogPath(label);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const splitted = content.replace(/\r?\n$/, '').split(/\r?\n/);
      return splitted.slice(-lines).join('\n');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return '';
      }
      throw error;
    }
  }
}

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;
