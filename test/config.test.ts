import {mkdir, mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {BUNDLED_INSTRUCTIONS_PATH, loadInstructions, resolveInstructionsPath} from '../src/config/instructions.js'
import {loadConfig, redactConfig} from '../src/config/load-config.js'
import {ConfigurationError} from '../src/core/errors.js'

describe('loadConfig', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mailpilot-config-'))
  })

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true})
  })

  it('merges the rc file with environment overrides and fills defaults', async () => {
    await writeFile(
      join(dir, '.mailpilotrc.json'),
      JSON.stringify({
        provider: 'mock',
        runtime: {maxIterations: 4},
        mailbox: {userId: 'file@example.com', tenantId: 'file-tenant'}
      })
    )

    const config = await loadConfig({
      searchFrom: dir,
      env: {
        TENANT_ID: 'env-tenant',
        CLIENT_ID: 'client-1',
        CLIENT_SECRET: 'test-secret',
        MAILPILOT_HOME: dir,
        MAILPILOT_DISPLAY_MODE: 'debug',
        MAILPILOT_MODEL_TIMEOUT_MS: 'soon'
      }
    })

    expect(config.provider).toBe('mock')
    expect(config.homeDir).toBe(dir)
    expect(config.runtime).toEqual({modelTimeoutMs: 45_000, maxIterations: 4})
    expect(config.mailbox).toEqual({
      userId: 'file@example.com',
      tenantId: 'env-tenant',
      clientId: 'client-1',
      clientSecret: 'test-secret',
      scope: 'https://graph.microsoft.com/.default',
      graphBaseUrl: 'https://graph.microsoft.com/v1.0',
      authorityHost: 'https://login.microsoftonline.com',
      requestTimeoutMs: 30_000
    })
    expect(config.display).toEqual({mode: 'debug', maxContentLength: 500})
  })

  it('reads numeric limits from the environment', async () => {
    const config = await loadConfig({
      searchFrom: dir,
      env: {MAILPILOT_HOME: dir, MAILPILOT_MAX_ITERATIONS: '3', MAILPILOT_MODEL_TIMEOUT_MS: '1500'}
    })

    expect(config.provider).toBe('openai')
    expect(config.runtime).toEqual({modelTimeoutMs: 1500, maxIterations: 3})
  })

  it('rejects invalid values with a ConfigurationError naming the field', async () => {
    const pending = loadConfig({searchFrom: dir, env: {MAILPILOT_HOME: dir, MAILPILOT_PROVIDER: 'carrier-pigeon'}})

    await expect(pending).rejects.toBeInstanceOf(ConfigurationError)
    await expect(pending).rejects.toThrow(/^Invalid configuration: provider: /)
  })

  it('redacts the client secret', async () => {
    const config = await loadConfig({searchFrom: dir, env: {MAILPILOT_HOME: dir, CLIENT_SECRET: 'test-secret'}})

    expect(redactConfig(config).mailbox.clientSecret).toBe('********')
    expect(config.mailbox.clientSecret).toBe('test-secret')
  })
})

describe('instructions', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mailpilot-home-'))
  })

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true})
  })

  it('falls back to the bundled instructions', async () => {
    expect(resolveInstructionsPath({homeDir: dir})).toBe(BUNDLED_INSTRUCTIONS_PATH)
    expect(await loadInstructions({homeDir: dir})).toMatch(/^You are a mailbox assistant/)
  })

  it('prefers the copy in the mailpilot home, then an explicit file', async () => {
    await mkdir(dir, {recursive: true})
    await writeFile(join(dir, 'instructions.md'), '\n  Answer in French.\n')
    const explicit = join(dir, 'custom.md')
    await writeFile(explicit, 'Answer in Dutch.')

    expect(await loadInstructions({homeDir: dir})).toBe('Answer in French.')
    expect(await loadInstructions({homeDir: dir, instructionsFile: explicit})).toBe('Answer in Dutch.')
  })

  it('raises ConfigurationError for a missing explicit file', async () => {
    await expect(loadInstructions({homeDir: dir, instructionsFile: join(dir, 'missing.md')})).rejects.toBeInstanceOf(
      ConfigurationError
    )
  })
})
