import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {resolveInstructionsPath} from '../config/instructions.js'
import {loadConfig, redactConfig} from '../config/load-config.js'
import {getGlobalEnvPath, getLogsDir} from '../config/paths.js'
import type {AppConfig} from '../config/schema.js'
import {errorMessage} from '../core/errors.js'
import {providerFromConfig} from '../core/runtime.js'
import {OpenAIProvider} from '../providers/openai-provider.js'

const CREDENTIAL_VARIABLES = [
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_BASE_URL',
  'TENANT_ID',
  'CLIENT_ID',
  'CLIENT_SECRET',
  'MAILBOX_USER_ID'
] as const

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  mailpilotHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  instructionsPath: string
  logsDir: string
  env: Record<(typeof CREDENTIAL_VARIABLES)[number], boolean>
  mailboxReady: boolean
  ping?: {ok: boolean; detail: string}
  config: AppConfig
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config, credentials and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'}),
    ping: Flags.boolean({description: 'send one request to the model endpoint'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const config = await loadConfig()
    const localEnvPath = `${process.cwd()}/.env`
    const {userId, tenantId, clientId, clientSecret} = config.mailbox

    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      mailpilotHome: config.homeDir,
      globalEnvPath: getGlobalEnvPath(config.homeDir),
      globalEnvExists: existsSync(getGlobalEnvPath(config.homeDir)),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      instructionsPath: resolveInstructionsPath(config),
      logsDir: getLogsDir(config.homeDir),
      env: {
        OPENAI_API_KEY: Boolean(process.env.OPENAI_API_KEY),
        OPENAI_MODEL: Boolean(process.env.OPENAI_MODEL),
        OPENAI_BASE_URL: Boolean(process.env.OPENAI_BASE_URL),
        TENANT_ID: Boolean(process.env.TENANT_ID),
        CLIENT_ID: Boolean(process.env.CLIENT_ID),
        CLIENT_SECRET: Boolean(process.env.CLIENT_SECRET),
        MAILBOX_USER_ID: Boolean(process.env.MAILBOX_USER_ID)
      },
      mailboxReady: Boolean(userId && tenantId && clientId && clientSecret),
      config: redactConfig(config)
    }

    if (flags.ping) report.ping = await this.ping(config)

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`mailpilot version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`mailpilot home: ${report.mailpilotHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(`instructions: ${report.instructionsPath}`)
    this.log(`session logs: ${report.logsDir}`)
    this.log(`env flags: ${CREDENTIAL_VARIABLES.map((name) => `${name}=${report.env[name]}`).join(' ')}`)
    this.log(`mailbox credentials complete: ${report.mailboxReady}`)
    if (report.ping) this.log(`model ping: ${report.ping.ok ? 'ok' : 'failed'} (${report.ping.detail})`)
    this.log('resolved config:')
    this.log(JSON.stringify(report.config, null, 2))
  }

  private async ping(config: AppConfig): Promise<{ok: boolean; detail: string}> {
    try {
      const provider = providerFromConfig(config)
      if (!(provider instanceof OpenAIProvider)) return {ok: true, detail: `${provider.name} provider needs no endpoint`}
      const health = await provider.healthCheck()
      return {ok: health.ok, detail: health.message ?? `${provider.model} answered`}
    } catch (error) {
      return {ok: false, detail: errorMessage(error)}
    }
  }
}
