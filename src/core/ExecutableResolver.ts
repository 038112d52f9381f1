import fs from 'fs';
import path from 'node:path';

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

const isExecutableFile = (candidate: string, platform: NodeJS.Platform): boolean => {
  try {
    const stat = fs.statSync(candidate);
    if (!stat.isFile()) return false;
    if (platform === 'win32') return true;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

const candidateNames = (name: string, platform: NodeJS.Platform, pathExt?: string): string[] => {
  if (platform !== 'win32' || path.win32.extname(name)) {
    return [name];
  }
  const extensions = (pathExt || DEFAULT_PATHEXT)
    .split(';')
    .map((ext) => ext.trim())
    .filter(Boolean);
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)];
};

export const resolveExecutable = (
  name: string,
  pathValue: string | undefined,
  platform: NodeJS.Platform = process.platform,
  pathExt: string | undefined = process.env.PATHEXT,
): string | null => {
  const pathApi = platform === 'win32' ? path.win32 : path.posix;
  const trimmed = name.trim();
  if (!trimmed) return null;

  const hasSeparator = trimmed.includes('/') || (platform === 'win32' && trimmed.includes('\\'));
  if (hasSeparator) {
    for (const candidate of candidateNames(trimmed, platform, pathExt)) {
      if (isExecutableFile(candidate, platform)) {
        return pathApi.resolve(candidate);
      }
    }
    return null;
  }

  const directories = (pathValue ?? '')
    .split(pathApi.delimiter)
    .map((dir) => dir.trim())
    .filter(Boolean);

  for (const dir of directories) {
    for (const candidate of candidateNames(trimmed, platform, pathExt)) {
      const fullPath = pathApi.join(dir, candidate);
      if (isExecutableFile(fullPath, platform)) {
        return fullPath;
      }
    }
  }

  return null;
};
