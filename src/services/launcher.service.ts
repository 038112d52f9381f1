import { LOOPBACK_HOST, type LauncherConfig } from '../config/launcher'
import { TUNNEL_LABEL, buildApiUrl, buildLaunchPlan } from '../core/LaunchCommandBuilder'
import type { LaunchResult, LaunchSpec } from '../core/LaunchSpec'
import { PreconditionError } from '../core/PreconditionError'
import { ProcessSupervisor, type ProcessSupervisorOptions, isDirectory } from '../core/ProcessSupervisor'
import { type VirtualEnvResolution, resolveVirtualEnv } from '../core/VirtualEnv'

export interface LaunchPlan {
  venv: VirtualEnvResolution
  specs: LaunchSpec[]
}

export interface LaunchReport extends LaunchPlan {
  results: LaunchResult[]
  urls: {
    backend: string
    api: string
    ui: string
  }
  guidance: string[]
}

export type SupervisorFactory = (config: LauncherConfig) => ProcessSupervisor

const ensureProjectDirectory = async (projectDirectory: string) => {
  if (!(await isDirectory(projectDirectory))) {
    throw new PreconditionError(projectDirectory, `Project directory not found: ${projectDirectory}`)
  }
}

const tunnelGuidance = (config: LauncherConfig): string[] => [
  `The tunnel could not be started with "${config.tunnelExecutable}".`,
  'Install ngrok from https://ngrok.com/download, or pass --tunnel-executable <path> and --tunnel-token <token>.',
  `The app is still reachable locally at http://localhost:${config.uiPort}.`,
]

export class LauncherService {
  constructor(private readonly createSupervisor: SupervisorFactory = defaultSupervisorFactory()) {}

  async preflight(config: LauncherConfig, platform: NodeJS.Platform = process.platform): Promise<VirtualEnvResolution> {
    await ensureProjectDirectory(config.projectDirectory)
    return resolveVirtualEnv(config.projectDirectory, config.venvDirectory, platform)
  }

  async plan(config: LauncherConfig, platform: NodeJS.Platform = process.platform): Promise<LaunchPlan> {
    const venv = await this.preflight(config, platform)
    return { venv, specs: buildLaunchPlan(config, venv, platform) }
  }

  async start(config: LauncherConfig, platform: NodeJS.Platform = process.platform): Promise<LaunchReport> {
    const { venv, specs } = await this.plan(config, platform)
    const supervisor = this.createSupervisor(config)

    console.log(`[Launcher] Launching ${specs.map((spec) => spec.label).join(', ')} from ${config.projectDirectory}`)
    const results = await supervisor.run(specs, config.interLaunchDelayMs)

    const tunnelFailed = results.some((result) => result.label === TUNNEL_LABEL && result.status === 'failed')

    return {
      venv,
      specs,
      results,
      urls: {
        backend: `http://${LOOPBACK_HOST}:${config.backendPort}`,
        api: buildApiUrl(config.backendPort),
        ui: `http://localhost:${config.uiPort}`,
      },
      guidance: tunnelFailed ? tunnelGuidance(config) : [],
    }
  }
}

export function defaultSupervisorFactory(overrides: ProcessSupervisorOptions = {}): SupervisorFactory {
  return (config) =>
    new ProcessSupervisor({
      logDirectory: config.logDirectory,
      readinessTimeoutMs: config.readinessTimeoutMs,
      ...overrides,
    })
}

export const launcherService = new LauncherService()
