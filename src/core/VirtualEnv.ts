import fs from 'fs';
import path from 'node:path';
import { findEnvKey } from './Environment';
import { PreconditionError } from './PreconditionError';

export interface VirtualEnvResolution {
  root: string;
  binDir: string;
  python: string;
  activationScript: string;
}

const layoutFor = (platform: NodeJS.Platform) =>
  platform === 'win32'
    ? { api: path.win32, binDir: 'Scripts', python: 'python.exe', activation: 'Activate.ps1' }
    : { api: path.posix, binDir: 'bin', python: 'python', activation: 'activate' };

export const resolveVirtualEnv = (
  projectDirectory: string,
  venvDirectory: string,
  platform: NodeJS.Platform = process.platform,
): VirtualEnvResolution => {
  const layout = layoutFor(platform);
  const root = layout.api.resolve(projectDirectory, venvDirectory);
  const binDir = layout.api.join(root, layout.binDir);
  const activationScript = layout.api.join(binDir, layout.activation);

  if (!fs.existsSync(activationScript)) {
    throw new PreconditionError(
      activationScript,
      `Virtual environment not found: ${activationScript} is missing. Create it with "python -m venv ${venvDirectory}" in ${projectDirectory} and install the project requirements.`,
    );
  }

  console.debug(`[VirtualEnv] Using virtual environment at ${root}`);
  return {
    root,
    binDir,
    python: layout.api.join(binDir, layout.python),
    activationScript,
  };
};

// Same effect as sourcing the activation script, without a shell.
export const applyVirtualEnv = (
  env: Record<string, string>,
  venv: VirtualEnvResolution,
  platform: NodeJS.Platform = process.platform,
  basePath: string | undefined = process.env.PATH,
): Record<string, string> => {
  const delimiter = platform === 'win32' ? path.win32.delimiter : path.posix.delimiter;
  const pathKey = findEnvKey(env, 'PATH', platform) ?? 'PATH';
  return {
    ...env,
    VIRTUAL_ENV: venv.root,
    [pathKey]: basePath ? `${venv.binDir}${delimiter}${basePath}` : venv.binDir,
  };
};
