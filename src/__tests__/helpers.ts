import { EventEmitter } from 'node:events'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { performance } from 'node:perf_hooks'
import type { SpawnOptions } from 'node:child_process'
import type { ProcessSpawner, SupervisorLogger } from '../core/ProcessSupervisor'

export class FakeChild extends EventEmitter {
  unrefCalled = false

  constructor(readonly pid: number | undefined) {
    super()
  }

  unref(): void {
    this.unrefCalled = true
  }
}

export interface SpawnCall {
  command: string
  args: string[]
  options: SpawnOptions
  at: number
  child: FakeChild
}

export const errnoError = (message: string, code: string): NodeJS.ErrnoException => {
  const error: NodeJS.ErrnoException = new Error(message)
  error.code = code
  return error
}

// Emits 'spawn' (or the error returned by failWith) on the next tick, like a real ChildProcess.
export const createFakeSpawner = (failWith?: (command: string, args: string[]) => Error | null) => {
  const calls: SpawnCall[] = []
  let nextPid = 1000

  const spawner: ProcessSpawner = (command, args, options) => {
    const error = failWith?.(command, args) ?? null
    const child = new FakeChild(error ? undefined : nextPid++)
    calls.push({ command, args, options, at: performance.now(), child })
    process.nextTick(() => {
      if (error) {
        child.emit('error', error)
      } else {
        child.emit('spawn')
      }
    })
    return child
  }

  return { spawner, calls }
}

export const createCapturingLogger = () => {
  const lines: string[] = []
  const record = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '))
  }
  const logger: SupervisorLogger = { log: record, warn: record, error: record }
  return { logger, lines }
}

export const makeTempDir = (prefix = 'stack-launcher-'): string => fs.mkdtempSync(path.join(os.tmpdir(), prefix))

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true })
}

export const writeExecutable = (dir: string, name: string, body = 'exit 0'): string => {
  fs.mkdirSync(dir, { recursive: true })
  const filePath = path.join(dir, name)
  fs.writeFileSync(filePath, `#!/bin/sh\n${body}\n`, 'utf-8')
  fs.chmodSync(filePath, 0o755)
  return filePath
}

// Lays out <project>/.venv/bin/activate the way "python -m venv" does on POSIX.
export const makeProjectWithVenv = (): string => {
  const project = makeTempDir('stack-project-')
  const binDir = path.join(project, '.venv', 'bin')
  fs.mkdirSync(binDir, { recursive: true })
  fs.writeFileSync(path.join(binDir, 'activate'), '# venv activation\n', 'utf-8')
  return project
}
