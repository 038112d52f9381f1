import path from 'path'
import { ConfigError } from '../core/ConfigError'

export interface LauncherConfig {
  projectDirectory: string
  venvDirectory: string
  backendApp: string
  uiScript: string
  backendPort: number
  uiPort: number
  tunnelEnabled: boolean
  tunnelExecutable: string
  tunnelToken: string
  interLaunchDelayMs: number
  readinessTimeoutMs: number
  logDirectory: string
}

// Raw values as they arrive from the command line; anything unset falls back to env, then defaults.
export interface LauncherOverrides {
  projectDir?: string
  venv?: string
  backendApp?: string
  uiScript?: string
  backendPort?: string
  uiPort?: string
  tunnel?: boolean
  tunnelExecutable?: string
  tunnelToken?: string
  delay?: string
  waitReady?: string
  logDir?: string
}

export const DEFAULT_BACKEND_PORT = 7861
export const DEFAULT_UI_PORT = 7862
export const DEFAULT_TUNNEL_EXECUTABLE = 'ngrok'
export const DEFAULT_INTER_LAUNCH_DELAY_MS = 3000
export const LOOPBACK_HOST = '127.0.0.1'

const pick = (...values: (string | undefined)[]): string | undefined => {
  for (const value of values) {
    if (value !== undefined && value.trim().length > 0) return value.trim()
  }
  return undefined
}

const parsePort = (option: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined) return fallback
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(option, `${option} must be an integer between 1 and 65535 (got "${raw}")`)
  }
  return port
}

const parseDuration = (option: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(option, `${option} must be a non-negative number of milliseconds (got "${raw}")`)
  }
  return value
}

const parseFlag = (option: string, raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback
  const normalized = raw.toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw new ConfigError(option, `${option} must be true or false (got "${raw}")`)
}

export interface LauncherDirectories {
  projectDirectory: string
  logDirectory: string
}

// Only the paths, without port or delay validation, for commands that just read logs.
export const resolveLauncherDirectories = (
  overrides: Pick<LauncherOverrides, 'projectDir' | 'logDir'> = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): LauncherDirectories => {
  const projectDirectory = path.resolve(cwd, pick(overrides.projectDir, env.LAUNCHER_PROJECT_DIR) ?? '.')
  const logDirOverride = pick(overrides.logDir, env.LAUNCHER_LOG_DIR)
  return {
    projectDirectory,
    logDirectory,
  }
}

export const loadLauncherConfig = (
  overrides: LauncherOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): LauncherConfig => {
  const { projectDirectory, logDirectory } = resolveLauncherDirectories(overrides, env, cwd)

  const backendPort = parsePort('backendPort', pick(overrides.backendPort, env.BACKEND_PORT), DEFAULT_BACKEND_PORT)
  const uiPort = parsePort('uiPort', pick(overrides.uiPort, env.UI_PORT), DEFAULT_UI_PORT)
  if (backendPort === uiPort) {
    throw new ConfigError('uiPort', `backendPort and uiPort must differ (both are ${uiPort})`)
  }

  // commander sets tunnel=false for --no-tunnel and true otherwise, so only an explicit opt-out wins over env.
  const tunnelEnabled =
    overrides.tunnel === false ? false : parseFlag('tunnelEnabled', pick(env.TUNNEL_ENABLED), true)

  return {
    projectDirectory,
    venvDirectory: pick(overrides.venv, env.LAUNCHER_VENV_DIR) ?? '.venv',
    backendApp: pick(overrides.backendApp, env.LAUNCHER_BACKEND_APP) ?? 'app:app',
    uiScript: pick(overrides.uiScript, env.LAUNCHER_UI_SCRIPT) ?? 'ui_streamlit.py',
    backendPort,
    uiPort,
    tunnelEnabled,
    tunnelExecutable: pick(overrides.tunnelExecutable, env.NGROK_PATH) ?? DEFAULT_TUNNEL_EXECUTABLE,
    tunnelToken: pick(overrides.tunnelToken, env.NGROK_AUTHTOKEN) ?? '',
    interLaunchDelayMs: parseDuration(
      'interLaunchDelayMs',
      pick(overrides.delay, env.LAUNCH_DELAY_MS),
      DEFAULT_INTER_LAUNCH_DELAY_MS,
    ),
    readinessTimeoutMs: parseDuration('readinessTimeoutMs', pick(overrides.waitReady, env.READINESS_TIMEOUT_MS), 0),
    logDirectory,
  }
}
