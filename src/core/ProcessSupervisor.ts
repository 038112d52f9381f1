import { type SpawnOptions, spawn } from 'child_process';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { mergeEnvironment, readEnv } from './Environment';
import { LaunchError } from './LaunchError';
import type { LaunchResult, LaunchSpec, PrepareStep } from './LaunchSpec';
import { LogService, isErrnoException } from './LogService';
import { PreconditionError } from './PreconditionError';
import { resolveExecutable } from './ExecutableResolver';
import { waitForPort } from './ReadinessProbe';
import { SequenceAbortedError } from './SequenceAbortedError';

// The slice of ChildProcess the supervisor relies on.
export interface SpawnedProcess {
  readonly pid?: number;
  once(event: 'spawn', listener: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'spawn', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
  unref(): void;
}

export type ProcessSpawner = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

// Runs a command to completion and resolves with its exit code (null when killed by a signal).
export type StepRunner = (command: string, args: string[], options: SpawnOptions) => Promise<number | null>;

export type SupervisorLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface ProcessSupervisorOptions {
  spawner?: ProcessSpawner;
  stepRunner?: StepRunner;
  baseEnvironment?: NodeJS.ProcessEnv;
  sleep?: (ms: number) => Promise<void>;
  // When set, child stdout/stderr are appended to <logDirectory>/<label>.log.
  logDirectory?: string;
  // 0 disables the readiness probe between launches.
  readinessTimeoutMs?: number;
  platform?: NodeJS.Platform;
  logger?: SupervisorLogger;
}

const defaultSpawner: ProcessSpawner = (command, args, options) => spawn(command, args, options);

const defaultStepRunner: StepRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, options);
    child.once('error', reject);
    child.once('close', (code) => resolve(code));
  });

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Any stat failure (missing, not a directory, no permission) counts as "not a usable directory".
export const isDirectory = async (dirPath: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch (error: unknown) {
    if (isErrnoException(error)) {
      return false;
    }
    throw error;
  }
};

const toLaunchError = (label: string, error: unknown): LaunchError => {
  if (error instanceof LaunchError) return error;
  const errno = isErrnoException(error) && typeof error.code === 'string' ? error.code : null;
  const message = error instanceof Error ? error.message : String(error);
  return new LaunchError(label, `Failed to start ${label}: ${message}`, errno);
};

export class ProcessSupervisor {
  private readonly spawner: ProcessSpawner;
  private readonly stepRunner: StepRunner;
  private readonly baseEnvironment: NodeJS.ProcessEnv;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logService: LogService | null;
  private readonly readinessTimeoutMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly logger: SupervisorLogger;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.spawner = options.spawner ?? defaultSpawner;
    this.stepRunner = options.stepRunner ?? defaultStepRunner;
    this.baseEnvironment = options.baseEnvironment ?? process.env;
    this.sleep = options.sleep ?? defaultSleep;
    this.logService = options.logDirectory ? new LogService(options.logDirectory) : null;
    this.readinessTimeoutMs = Math.max(0, options.readinessTimeoutMs ?? 0);
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? console;
  }

  async launch(spec: LaunchSpec): Promise<LaunchResult> {
    const { label } = spec;

    if (!(await isDirectory(spec.workingDirectory))) {
      const error = new PreconditionError(
        spec.workingDirectory,
        `Working directory for ${label} not found: ${spec.workingDirectory}`,
      );
      this.logger.error(`[Supervisor] ${error.message}`);
      return { label, status: 'failed', error };
    }

    const env = mergeEnvironment(this.baseEnvironment, spec.environment, this.platform);

    for (const executable of spec.requires ?? []) {
      if (!this.resolve(executable, env)) {
        const error = new LaunchError(label, `Executable "${executable}" required by ${label} was not found`, 'ENOENT');
        this.logger.error(`[Supervisor] ${error.message}`);
        return { label, status: 'failed', error };
      }
    }

    let logHandle: FileHandle | null = null;
    try {
      logHandle = this.logService ? await this.logService.openChildLog(label) : null;
      const output = logHandle ? logHandle.fd : 'ignore';

      for (const step of spec.prepare ?? []) {
        await this.runStep(spec, step, env, output);
      }

      const child = this.spawner(spec.command, [...spec.args], {
        cwd: spec.workingDirectory,
        env,
        detached: true,
        stdio: ['ignore', output, output],
        windowsHide: false,
      });

      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error) => {
          child.off('spawn', onSpawn);
          reject(error);
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });

      child.unref();
      const pid = child.pid ?? null;
      this.logger.log(`[Supervisor] Launched ${label} (pid=${pid ?? 'unknown'})`);
      return { label, status: 'launched', pid, startedAt: new Date() };
    } catch (cause: unknown) {
      const error = toLaunchError(label, cause);
      this.logger.error(`[Supervisor] ${error.message}`);
      return { label, status: 'failed', error };
    } finally {
      await logHandle?.close();
    }
  }

  private resolve(executable: string, env: NodeJS.ProcessEnv): string | null {
    return resolveExecutable(
      executable,
      readEnv(env, 'PATH', this.platform),
      this.platform,
      readEnv(env, 'PATHEXT', this.platform),
    );
  }

  private async runStep(
    spec: LaunchSpec,
    step: PrepareStep,
    env: NodeJS.ProcessEnv,
    output: number | 'ignore',
  ): Promise<void> {
    this.logger.log(`[Supervisor] ${step.description} for ${spec.label}`);
    const exitCode = await this.stepRunner(this.resolve(step.command, env) ?? step.command, [...step.args], {
      cwd: spec.workingDirectory,
      env,
      stdio: ['ignore', output, output],
      windowsHide: true,
    });
    if (exitCode !== 0) {
      throw new LaunchError(
        spec.label,
        `${step.description} failed for ${spec.label} (exit code ${exitCode ?? 'none, killed by signal'})`,
        null,
      );
    }
  }

  async run(specs: readonly LaunchSpec[], interLaunchDelayMs: number): Promise<LaunchResult[]> {
    const results: LaunchResult[] = [];

    for (let index = 0; index < specs.length; index += 1) {
      const spec = specs[index];
      this.logger.log(`[Supervisor] Starting ${spec.label} (${index + 1}/${specs.length})`);
      const result = await this.launch(spec);
      results.push(result);

      if (result.status === 'failed') {
        if (!spec.optional) {
          throw new SequenceAbortedError(spec.label, results, result.error);
        }
        this.logger.warn(`[Supervisor] Optional process ${spec.label} did not start; continuing`);
      }

      if (index === specs.length - 1) continue;

      await this.sleep(interLaunchDelayMs);

      if (result.status === 'launched' && spec.readiness && this.readinessTimeoutMs > 0) {
        const { host, port } = spec.readiness;
        const ready = await waitForPort(host, port, this.readinessTimeoutMs);
        if (ready) {
          this.logger.log(`[Supervisor] ${spec.label} is accepting connections on ${host}:${port}`);
        } else {
          this.logger.warn(
            `[Supervisor] ${spec.label} did not open ${host}:${port} within ${this.readinessTimeoutMs}ms; continuing`,
          );
        }
      }
    }

    return results;
  }
}
