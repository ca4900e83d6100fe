import { describe, it, expect, afterEach, vi } from 'vitest'
import { readFile, readlink, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { provision } from '../core/provisioner'
import { fsx } from '../utils/fs'
import { FakeRunner } from '../../tests/helpers/fake-runner'
import { copyLikeRsync, makeHostTree, writeTree, type HostTree } from '../../tests/helpers/host-tree'
import type { ProvisionConfig } from '../types/config'

let tree: HostTree | undefined

afterEach(async () => {
  await tree?.cleanup()
  tree = undefined
})

async function setup(overrides: Partial<ProvisionConfig> = {}): Promise<{ tree: HostTree; runner: FakeRunner }> {
  const t = await makeHostTree(overrides)
  tree = t
  const runner = new FakeRunner().onCommand('rsync', copyLikeRsync)
  return { tree: t, runner }
}

function stepKinds(steps: ReadonlyArray<{ readonly name: string; readonly outcome: { readonly kind: string } }>): Record<string, string> {
  return Object.fromEntries(steps.map((s) => [s.name, s.outcome.kind]))
}

describe('provision', () => {
  it('deploys example.com end to end', async () => {
    const { tree: t, runner } = await setup()
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(res.ok).toBe(true)
    expect(res.urls).toEqual({ frontend: 'http://example.com/', api: 'http://example.com/api/', widget: 'http://example.com/widget/' })

    const { systemdDir, nginxSitesAvailable, nginxSitesEnabled, baseDir } = t.config.paths
    expect(await readFile(join(systemdDir, 'mevo-api.service'), 'utf8')).toContain('Environment=PORT=3000\n')
    expect(await readFile(join(systemdDir, 'mevobot-v2.service'), 'utf8')).toContain('Environment=PORT=3002\n')
    const site = await readFile(join(nginxSitesAvailable, 'mevo.conf'), 'utf8')
    expect(site).toContain('server_name example.com;')
    expect(site).toContain('location /api/ {')
    expect(site).toContain('location /widget/ {')
    expect(await readlink(join(nginxSitesEnabled, 'mevo.conf'))).toBe(join(nginxSitesAvailable, 'mevo.conf'))

    const lines = vi.mocked(console.log).mock.calls.map((c) => String(c[0]))
    expect(lines).toContain('[info] Frontend:  http://example.com/')
    expect(lines).toContain('[info] API:       http://example.com/api/')
    expect(lines).toContain('[info] Widget:    http://example.com/widget/')

    const cmds = runner.commands()
    expect(cmds[0]).toBe('apt-get update -y')
    expect(cmds[1]).toBe('apt-get install -y curl git rsync nginx ufw build-essential')
    expect(runner.calls[0]?.env).toEqual({ DEBIAN_FRONTEND: 'noninteractive' })
    expect(cmds).toContain(`chown -R deploy:deploy ${baseDir}`)
    expect(cmds.indexOf('nginx -t')).toBeLessThan(cmds.indexOf('systemctl reload nginx'))
    expect(cmds.some((c) => c.includes('mongodb') || c.includes('certbot'))).toBe(false)
    const builds = runner.calls.filter((c) => c.cmd === 'npm run build').map((c) => c.cwd)
    expect(builds).toEqual([join(baseDir, 'mevo-api'), join(baseDir, 'mevo-v2'), join(baseDir, 'mevobot_v2')])
    expect(cmds.slice(-8)).toEqual([
      'npm run build',
      'systemctl daemon-reload',
      'systemctl enable mevo-api',
      'systemctl enable mevobot-v2',
      'systemctl restart mevo-api',
      'systemctl restart mevobot-v2',
      'nginx -t',
      'systemctl reload nginx'
    ])
  })

  it('creates production.env with mode and port on first run', async () => {
    const { tree: t, runner } = await setup()
    await provision(t.config, { runner, getuid: () => 0 })
    const env = await readFile(join(t.config.paths.baseDir, 'mevo-api/src/common/envs/production.env'), 'utf8')
    expect(env).toContain('MODE=production\n')
    expect(env).toContain('PORT=3000\n')
  })

  it('keeps an existing production.env byte-identical and out of the mirror', async () => {
    const { tree: t, runner } = await setup()
    const target = join(t.config.paths.baseDir, 'mevo-api/src/common/envs/production.env')
    await writeTree(t.config.paths.baseDir, { 'mevo-api/src/common/envs/production.env': 'MODE=production\nJWT_SECRET=test-secret\n# keep me' })
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(await readFile(target, 'utf8')).toBe('MODE=production\nJWT_SECRET=test-secret\n# keep me')
    expect(stepKinds(res.steps)['materialize-secrets']).toBe('skipped')
    expect(runner.commands()).toContain(`rsync -a --delete --exclude=/src/common/envs/production.env ${join(t.src, 'mevo-api')}/ ${join(t.config.paths.baseDir, 'mevo-api')}/`)
  })

  it('is stable across a second identical run', async () => {
    const { tree: t, runner } = await setup()
    await writeTree(t.src, { 'mevo-api/src/common/envs/local.env': 'MODE=local\nPORT=3000\n' })
    await provision(t.config, { runner, getuid: () => 0 })
    const envPath = join(t.config.paths.baseDir, 'mevo-api/src/common/envs/production.env')
    const unitPath = join(t.config.paths.systemdDir, 'mevo-api.service')
    const first = [await readFile(envPath, 'utf8'), await readFile(unitPath, 'utf8')]
    const second = await provision(t.config, { runner: new FakeRunner().onCommand('rsync', copyLikeRsync), getuid: () => 0 })
    expect(second.exitCode).toBe(0)
    expect([await readFile(envPath, 'utf8'), await readFile(unitPath, 'utf8')]).toEqual(first)
  })

  it('points the built frontend at /api', async () => {
    const { tree: t, runner } = await setup()
    await writeTree(t.src, { 'mevo-v2/src/utils/http/request.ts': 'const API_ROOT = "http://localhost/api";\nexport const get = (p: string) => fetch(API_ROOT + p);\n' })
    const res = await provision(t.config, { runner, getuid: () => 0 })
    const deployed = await readFile(join(t.config.paths.baseDir, 'mevo-v2/src/utils/http/request.ts'), 'utf8')
    expect(deployed).toBe('const API_ROOT = "/api";\nexport const get = (p: string) => fetch(API_ROOT + p);\n')
    expect(await readFile(join(t.src, 'mevo-v2/src/utils/http/request.ts'), 'utf8')).toContain('http://localhost/api')
    expect(stepKinds(res.steps)['api-root-rewrite']).toBe('ok')
  })

  it('skips the rewrite silently when the pattern is absent', async () => {
    const { tree: t, runner } = await setup()
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(res.steps.find((s) => s.name === 'api-root-rewrite')?.outcome).toEqual({ kind: 'skipped', reason: 'src/utils/http/request.ts not found' })
  })

  it('stops before any command when not root', async () => {
    const { tree: t, runner } = await setup()
    const res = await provision(t.config, { runner, getuid: () => 1000 })
    expect(res.exitCode).toBe(1)
    expect(res.steps).toEqual([{ name: 'preflight', outcome: { kind: 'fatal', reason: 'Please run as root (use sudo).', exitCode: 1 } }])
    expect(runner.calls).toEqual([])
    expect(await fsx.exists(t.config.paths.baseDir)).toBe(false)
  })

  it('leaves the base dir alone when a project directory is missing', async () => {
    const t = await makeHostTree({}, false)
    tree = t
    await writeTree(t.src, { 'mevo-api/package.json': '{}', 'mevo-v2/package.json': '{}' })
    const runner = new FakeRunner()
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(1)
    expect(runner.calls).toEqual([])
    expect(await fsx.exists(t.config.paths.baseDir)).toBe(false)
  })

  it('aborts on a failed build with the tool exit code', async () => {
    const { tree: t, runner } = await setup()
    runner.failWhen('npm run build', 2)
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(2)
    expect(res.steps[res.steps.length - 1]).toEqual({ name: 'build-api', outcome: { kind: 'fatal', reason: 'npm run build (mevo-api) failed (exit 2)', exitCode: 2 } })
    expect(runner.commands().filter((c) => c.startsWith('systemctl'))).toEqual([])
    expect(await fsx.exists(join(t.config.paths.systemdDir, 'mevo-api.service'))).toBe(false)
  })

  it('aborts a fatal base install', async () => {
    const { tree: t, runner } = await setup()
    runner.failWhen('apt-get install -y curl', 100)
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(100)
    expect(runner.commands()).toEqual(['apt-get update -y', 'apt-get install -y curl git rsync nginx ufw build-essential'])
  })

  it('aborts when the NodeSource setup fails anywhere in the pipe', async () => {
    const { tree: t, runner } = await setup()
    runner.failWhen('bash -c', 7)
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(7)
    expect(res.steps[res.steps.length - 1]).toEqual({ name: 'runtime', outcome: { kind: 'fatal', reason: 'NodeSource setup failed (exit 7)', exitCode: 7 } })
    const cmds = runner.commands()
    expect(cmds[cmds.length - 1]).toBe("bash -c 'set -o pipefail; curl -fsSL https://deb.nodesource.com/setup_18.x | bash -'")
    expect(cmds).not.toContain('apt-get install -y nodejs')
    expect(cmds).not.toContain('npm ci')
  })

  it('does not reload nginx when the config test fails', async () => {
    const { tree: t, runner } = await setup()
    runner.failWhen('nginx -t', 1, 'nginx: [emerg] unexpected "}"')
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(1)
    expect(runner.commands()).not.toContain('systemctl reload nginx')
    expect(runner.commands()[runner.commands().length - 1]).toBe('nginx -t')
    expect(stepKinds(res.steps).proxy).toBe('fatal')
    expect(res.urls).toBeUndefined()
  })

  it('tolerates a failed database install', async () => {
    const { tree: t, runner } = await setup({ installDatabase: true })
    runner.failWhen('apt-get install -y mongodb', 100)
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(res.steps.find((s) => s.name === 'database')?.outcome).toEqual({ kind: 'tolerated', reason: 'apt-get install -y mongodb exited with 100' })
    expect(runner.commands()).toContain('systemctl start mongodb')
  })

  it('skips certificate issuance with a warning when no email is given', async () => {
    const { tree: t, runner } = await setup({ issueCertificate: true })
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(runner.commands().some((c) => c.includes('certbot'))).toBe(false)
    const warnings = vi.mocked(console.error).mock.calls.map((c) => String(c[0]))
    expect(warnings).toContain('[warn] --run-certificate-issuance provided but --email is missing; skipping certbot.')
  })

  it('issues a certificate and tolerates certbot failure', async () => {
    const { tree: t, runner } = await setup({ issueCertificate: true, certificateEmail: 'admin@example.com' })
    runner.failWhen('certbot', 1)
    const res = await provision(t.config, { runner, getuid: () => 0 })
    expect(res.exitCode).toBe(0)
    expect(runner.commands().slice(-2)).toEqual([
      'apt-get install -y certbot python3-certbot-nginx',
      'certbot --nginx -d example.com -m admin@example.com --agree-tos -n'
    ])
    expect(stepKinds(res.steps).certificate).toBe('tolerated')
  })

  it('plans without touching the host on a dry run', async () => {
    const { tree: t, runner } = await setup({ dryRun: true })
    const res = await provision(t.config, { runner, getuid: () => 1000 })
    expect(res.exitCode).toBe(0)
    expect(runner.calls).toEqual([])
    expect(await fsx.exists(t.config.paths.baseDir)).toBe(false)
    expect(await fsx.exists(t.config.paths.systemdDir)).toBe(false)
    expect(res.cmdPlan).toContain('nginx -t')
    expect(res.cmdPlan).toContain(`write ${join(t.config.paths.nginxSitesAvailable, 'mevo.conf')}`)
  })
})
