#!/usr/bin/env node
import 'dotenv/config'
import chalk from 'chalk'
import { Command } from 'commander'
import { type LauncherOverrides, loadLauncherConfig, resolveLauncherDirectories } from './config/launcher'
import { formatCommandLine } from './core/LaunchCommandBuilder'
import { LauncherError } from './core/LauncherError'
import { LogService } from './core/LogService'
import { SequenceAbortedError } from './core/SequenceAbortedError'
import { launcherService } from './services/launcher.service'
import pkg from '../package.json'

type LogsOptions = Pick<LauncherOverrides, 'projectDir' | 'logDir'> & { lines: string }

const program = new Command()

const withLaunchOptions = (command: Command): Command =>
  command
    .option('-d, --project-dir <path>', 'Directory containing app.py, the UI script and the virtual environment')
    .option('--venv <path>', 'Virtual environment directory, relative to the project (default: .venv)')
    .option('--backend-app <module:app>', 'ASGI application served by uvicorn (default: app:app)')
    .option('--ui-script <file>', 'Streamlit script (default: ui_streamlit.py)')
    .option('--backend-port <port>', 'Port for the backend (default: 7861)')
    .option('--ui-port <port>', 'Port for the UI (default: 7862)')
    .option('--no-tunnel', 'Do not start the public tunnel')
    .option('--tunnel-executable <path>', 'Tunnel executable name or path (default: ngrok)')
    .option('--tunnel-token <token>', 'Auth token registered with the tunnel before it starts')
    .option('--delay <ms>', 'Wait between launches in milliseconds (default: 3000)')
    .option('--wait-ready <ms>', 'After the delay, wait up to this long for each port to accept connections (default: 0, off)')
    .option('--log-dir <path>', 'Directory for child process logs (default: <project>/logs/launcher)')

const printError = (error: unknown) => {
  if (error instanceof SequenceAbortedError) {
    console.error(chalk.red(`❌ ${error.message}`))
    const launched = error.results.filter((result) => result.status === 'launched')
    if (launched.length > 0) {
      console.error(
        chalk.yellow(`Already running: ${launched.map((result) => result.label).join(', ')}. Stop them manually.`),
      )
    }
    return
  }
  if (error instanceof LauncherError) {
    console.error(chalk.red(`❌ ${error.message}`))
    return
  }
  console.error(chalk.red('❌ Unexpected error'), error)
}

program
  .name('stack-launcher')
  .description('Start the report chat backend, UI and optional tunnel as detached processes')
  .version(pkg.version)

withLaunchOptions(program.command('start', { isDefault: true }))
  .description('Launch backend, UI and tunnel in order')
  .action(async (options: LauncherOverrides) => {
    const config = loadLauncherConfig(options)
    const report = await launcherService.start(config)

    console.log('')
    for (const result of report.results) {
      if (result.status === 'launched') {
        console.log(chalk.green(`✅ ${result.label} started (pid ${result.pid ?? 'unknown'})`))
      } else {
        console.log(chalk.yellow(`⚠️  ${result.label} not started: ${result.error.message}`))
      }
    }

    console.log('')
    console.log(`Backend: ${chalk.cyan(report.urls.backend)} (questions go to ${report.urls.api})`)
    console.log(`UI:      ${chalk.cyan(report.urls.ui)}`)
    console.log(chalk.dim(`Logs:    ${config.logDirectory}`))

    for (const line of report.guidance) {
      console.log(chalk.yellow(line))
    }
  })

withLaunchOptions(program.command('plan'))
  .description('Show what would be launched without starting anything')
  .action(async (options: LauncherOverrides) => {
    const config = loadLauncherConfig(options)
    const { venv, specs } = await launcherService.plan(config)

    console.log(chalk.bold(`Virtual environment: ${venv.root}`))
    for (const spec of specs) {
      console.log('')
      console.log(chalk.bold(`${spec.label}${spec.optional ? chalk.dim(' (optional)') : ''}`))
      console.log(`  cwd:     ${spec.workingDirectory}`)
      for (const step of spec.prepare ?? []) {
        console.log(`  before:  ${formatCommandLine(step, [config.tunnelToken])}`)
      }
      console.log(`  command: ${formatCommandLine(spec, [config.tunnelToken])}`)
      for (const [name, value] of Object.entries(spec.environment)) {
        if (name === 'PATH') continue
        console.log(chalk.dim(`  env:     ${name}=${value}`))
      }
    }
    console.log('')
    console.log(chalk.dim(`Delay between launches: ${config.interLaunchDelayMs}ms`))
  })

program
  .command('logs <label>')
  .description('Print the end of a launched process log')
  .option('-d, --project-dir <path>', 'Project directory')
  .option('--log-dir <path>', 'Directory for child process logs')
  .option('-n, --lines <count>', 'Number of lines', '50')
  .action(async (label: string, options: LogsOptions) => {
    const { logDirectory } = resolveLauncherDirectories({ projectDir: options.projectDir, logDir: options.logDir })
    const lines = Math.max(1, Number.parseInt(options.lines, 10) || 50)
    const logService = new LogService(logDirectory)
    const tail = await logService.readTail(label, lines)
    if (!tail) {
      console.log(chalk.dim(`No log output for ${label} at ${logService.getLogPath(label)}`))
      return
    }
    console.log(tail)
  })

program.parseAsync(process.argv).catch((error: unknown) => {
  printError(error)
  process.exitCode = 1
})
