import type { LaunchError } from './LaunchError';
import type { PreconditionError } from './PreconditionError';

export interface ReadinessTarget {
  host: string;
  port: number;
}

// A short-lived command run to completion before the process is spawned.
export interface PrepareStep {
  readonly description: string;
  readonly command: string;
  readonly args: readonly string[];
}

export interface LaunchSpec {
  readonly label: string;
  readonly workingDirectory: string;
  readonly environment: Readonly<Record<string, string>>;
  readonly command: string;
  readonly args: readonly string[];
  // Optional specs only warn when they fail; critical ones abort the sequence.
  readonly optional: boolean;
  // Executables that must resolve on the child's PATH before spawning.
  readonly requires?: readonly string[];
  readonly readiness?: Readonly<ReadinessTarget>;
  // Each step must exit 0, in order, or the launch fails without spawning.
  readonly prepare?: readonly PrepareStep[];
}

export type LaunchSpecInput = Omit<LaunchSpec, 'optional'> & { optional?: boolean };

export const createLaunchSpec = (input: LaunchSpecInput): LaunchSpec => {
  const spec: LaunchSpec = {
    label: input.label,
    workingDirectory: input.workingDirectory,
    environment: Object.freeze({ ...input.environment }),
    command: input.command,
    args: Object.freeze([...input.args]),
    optional: input.optional ?? false,
    ...(input.requires ? { requires: Object.freeze([...input.requires]) } : {}),
    ...(input.readiness ? { readiness: Object.freeze({ ...input.readiness }) } : {}),
    ...(input.prepare
      ? {
          prepare: Object.freeze(
            input.prepare.map((step) => Object.freeze({ ...step, args: Object.freeze([...step.args]) })),
          ),
        }
      : {}),
  };
  return Object.freeze(spec);
};

export type LaunchResult =
  | {
      label: string;
      status: 'launched';
      pid: number | null;
      startedAt: Date;
    }
  | {
      label: string;
      status: 'failed';
      error: PreconditionError | LaunchError;
    };
