import { strict as assert } from 'node:assert'
import path from 'node:path'
import { test } from 'node:test'
import { loadLauncherConfig } from '../config/launcher'
import {
  buildApiUrl,
  buildBackendSpec,
  buildLaunchPlan,
  buildTunnelRegistration,
  buildTunnelSpec,
  buildUiSpec,
  formatCommandLine,
  shouldRegisterTunnelToken,
} from '../core/LaunchCommandBuilder'
import type { VirtualEnvResolution } from '../core/VirtualEnv'

const venv: VirtualEnvResolution = {
  root: '/srv/report-chat/.venv',
  binDir: '/srv/report-chat/.venv/bin',
  python: '/srv/report-chat/.venv/bin/python',
  activationScript: '/srv/report-chat/.venv/bin/activate',
}

const configWith = (overrides: Parameters<typeof loadLauncherConfig>[0] = {}) =>
  loadLauncherConfig(overrides, {}, '/srv/report-chat')

test('buildApiUrl points at the /ask endpoint on loopback', () => {
  assert.equal(buildApiUrl(7861), 'http://127.0.0.1:7861/ask')
})

test('backend spec runs uvicorn from the virtual environment', () => {
  const spec = buildBackendSpec(configWith(), venv)

  assert.equal(spec.label, 'backend')
  assert.equal(spec.workingDirectory, '/srv/report-chat')
  assert.equal(spec.command, '/srv/report-chat/.venv/bin/python')
  assert.deepEqual(spec.args, ['-m', 'uvicorn', 'app:app', '--host', '127.0.0.1', '--port', '7861'])
  assert.equal(spec.optional, false)
  assert.deepEqual(spec.readiness, { host: '127.0.0.1', port: 7861 })
  assert.equal(spec.environment.VIRTUAL_ENV, '/srv/report-chat/.venv')
  assert.equal(spec.environment.PATH.split(path.delimiter)[0], '/srv/report-chat/.venv/bin')
})

test('UI spec receives the backend URL for every backend port', () => {
  for (const port of [1, 80, 7861, 8080, 65535]) {
    const spec = buildUiSpec(configWith({ backendPort: String(port) }), venv)
    assert.equal(spec.environment.RAG_API_URL, `http://127.0.0.1:${port}/ask`)
  }
})

test('UI spec runs streamlit on the UI port', () => {
  const spec = buildUiSpec(configWith({ uiPort: '9000', uiScript: 'chat.py' }), venv)

  assert.equal(spec.label, 'ui')
  assert.equal(spec.command, '/srv/report-chat/.venv/bin/python')
  assert.deepEqual(spec.args, ['-m', 'streamlit', 'run', 'chat.py', '--server.port', '9000', '--server.headless', 'true'])
  assert.equal(spec.optional, false)
  assert.deepEqual(spec.readiness, { host: '127.0.0.1', port: 9000 })
})

test('tunnel token registration needs more than ten characters', () => {
  assert.equal(shouldRegisterTunnelToken(''), false)
  assert.equal(shouldRegisterTunnelToken('short-tok1'), false)
  assert.equal(shouldRegisterTunnelToken('short-tok12'), true)
})

test('tunnel spec without a usable token only exposes the UI port', () => {
  for (const token of ['', 'short-tok1']) {
    const spec = buildTunnelSpec(configWith({ tunnelToken: token }))

    assert.equal(spec.label, 'tunnel')
    assert.equal(spec.command, 'ngrok')
    assert.deepEqual(spec.args, ['http', '7862'])
    assert.equal(spec.optional, true)
    assert.deepEqual(spec.requires, ['ngrok'])
    assert.equal(spec.prepare, undefined)
  }
})

test('tunnel spec registers a long token as a separate step before starting', () => {
  const spec = buildTunnelSpec(configWith({ tunnelToken: 'test-token-123' }))

  assert.equal(spec.command, 'ngrok')
  assert.deepEqual(spec.args, ['http', '7862'])
  assert.equal(spec.optional, true)
  assert.deepEqual(spec.requires, ['ngrok'])
  assert.deepEqual(spec.prepare, [
    {
      description: 'Registering the tunnel auth token',
      command: 'ngrok',
      args: ['config', 'add-authtoken', 'test-token-123'],
    },
  ])
  assert.ok(Object.isFrozen(spec.prepare))
})

test('tunnel spec uses the configured executable for both steps', () => {
  const spec = buildTunnelSpec(configWith({ tunnelToken: 'test-token-123', tunnelExecutable: '/opt/my tools/ngrok' }))

  assert.equal(spec.command, '/opt/my tools/ngrok')
  assert.equal(spec.prepare?.[0].command, '/opt/my tools/ngrok')
  assert.deepEqual(spec.requires, ['/opt/my tools/ngrok'])
})

test('launch plan orders backend, UI, then tunnel', () => {
  assert.deepEqual(
    buildLaunchPlan(configWith(), venv, 'linux').map((spec) => spec.label),
    ['backend', 'ui', 'tunnel'],
  )
  assert.deepEqual(
    buildLaunchPlan(configWith({ tunnel: false }), venv, 'linux').map((spec) => spec.label),
    ['backend', 'ui'],
  )
})

test('launch specs are frozen', () => {
  const spec = buildUiSpec(configWith(), venv)

  assert.ok(Object.isFrozen(spec))
  assert.ok(Object.isFrozen(spec.args))
  assert.ok(Object.isFrozen(spec.environment))
})

test('formatCommandLine masks secrets', () => {
  const spec = buildTunnelSpec(configWith({ tunnelToken: 'test-token-123', tunnelExecutable: '/opt/my tools/ngrok' }))

  assert.equal(formatCommandLine(spec, ['test-token-123']), "'/opt/my tools/ngrok' http 7862")
  assert.equal(
    formatCommandLine(buildTunnelRegistration(configWith({ tunnelToken: 'test-token-123' })), ['test-token-123']),
    'ngrok config add-authtoken ***',
  )
  assert.equal(
    formatCommandLine(buildBackendSpec(configWith(), venv), ['']),
    '/srv/report-chat/.venv/bin/python -m uvicorn app:app --host 127.0.0.1 --port 7861',
  )
})
