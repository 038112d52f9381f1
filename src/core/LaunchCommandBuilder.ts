import { LOOPBACK_HOST, type LauncherConfig } from '../config/launcher';
import { type LaunchSpec, type PrepareStep, createLaunchSpec } from './LaunchSpec';
import { type VirtualEnvResolution, applyVirtualEnv } from './VirtualEnv';

export const BACKEND_LABEL = 'backend';
export const UI_LABEL = 'ui';
export const TUNNEL_LABEL = 'tunnel';

// Tokens of ten characters or fewer are treated as placeholders and never registered.
const MIN_TUNNEL_TOKEN_LENGTH = 10;

export const buildApiUrl = (backendPort: number): string => `http://${LOOPBACK_HOST}:${backendPort}/ask`;

export const shouldRegisterTunnelToken = (token: string): boolean => token.length > MIN_TUNNEL_TOKEN_LENGTH;

// Display only; commands are spawned without a shell.
export const quoteShellArg = (value: string): string =>
  /^[A-Za-z0-9_.:/=@%+-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;

export const buildBackendSpec = (
  config: LauncherConfig,
  venv: VirtualEnvResolution,
  platform: NodeJS.Platform = process.platform,
): LaunchSpec =>
  createLaunchSpec({
    label: BACKEND_LABEL,
    workingDirectory: config.projectDirectory,
    environment: applyVirtualEnv({ PYTHONUNBUFFERED: '1' }, venv, platform),
    command: venv.python,
    args: ['-m', 'uvicorn', config.backendApp, '--host', LOOPBACK_HOST, '--port', String(config.backendPort)],
    readiness: { host: LOOPBACK_HOST, port: config.backendPort },
  });

export const buildUiSpec = (
  config: LauncherConfig,
  venv: VirtualEnvResolution,
  platform: NodeJS.Platform = process.platform,
): LaunchSpec =>
  createLaunchSpec({
    label: UI_LABEL,
    workingDirectory: config.projectDirectory,
    environment: applyVirtualEnv({ RAG_API_URL: buildApiUrl(config.backendPort) }, venv, platform),
    command: venv.python,
    args: [
      '-m',
      'streamlit',
      'run',
      config.uiScript,
      '--server.port',
      String(config.uiPort),
      '--server.headless',
      'true',
    ],
    readiness: { host: LOOPBACK_HOST, port: config.uiPort },
  });

export const buildTunnelRegistration = (config: LauncherConfig): PrepareStep => ({
  description: 'Registering the tunnel auth token',
  command: config.tunnelExecutable,
  args: ['config', 'add-authtoken', config.tunnelToken],
});

export const buildTunnelSpec = (config: LauncherConfig): LaunchSpec =>
  createLaunchSpec({
    label: TUNNEL_LABEL,
    workingDirectory: config.projectDirectory,
    environment: {},
    command: config.tunnelExecutable,
    args: ['http', String(config.uiPort)],
    optional: true,
    requires: [config.tunnelExecutable],
    ...(shouldRegisterTunnelToken(config.tunnelToken) ? { prepare: [buildTunnelRegistration(config)] } : {}),
  });

export const buildLaunchPlan = (
  config: LauncherConfig,
  venv: VirtualEnvResolution,
  platform: NodeJS.Platform = process.platform,
): LaunchSpec[] => {
  const specs = [buildBackendSpec(config, venv, platform), buildUiSpec(config, venv, platform)];
  if (config.tunnelEnabled) {
    specs.push(buildTunnelSpec(config));
  }
  return specs;
};

export const formatCommandLine = (
  command: Pick<LaunchSpec, 'command' | 'args'>,
  secrets: readonly string[] = [],
): string => {
  const line = [command.command, ...command.args].map(quoteShellArg).join(' ');
  return secrets.filter(Boolean).reduce((masked, secret) => masked.split(secret).join('***'), line);
};
