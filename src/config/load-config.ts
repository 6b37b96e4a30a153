import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {ConfigurationError} from '../core/errors.js'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

export type LoadConfigOptions = {
  /** Directory cosmiconfig starts from; defaults to the working directory. */
  searchFrom?: string
  env?: NodeJS.ProcessEnv
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const parsed = Number.parseInt(env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env
  const explorer = cosmiconfig('mailpilot')
  const result = await explorer.search(options.searchFrom)
  const base = section(result?.config)
  const baseRuntime = section(base.runtime)
  const baseMailbox = section(base.mailbox)
  const baseDisplay = section(base.display)
  const modelTimeoutMs = positiveIntFromEnv(env, 'MAILPILOT_MODEL_TIMEOUT_MS')
  const maxIterations = positiveIntFromEnv(env, 'MAILPILOT_MAX_ITERATIONS')

  const merged: Record<string, unknown> = {
    ...base,
    provider: nonEmpty(env.MAILPILOT_PROVIDER) ?? base.provider,
    model: nonEmpty(env.OPENAI_MODEL) ?? base.model,
    baseURL: nonEmpty(env.OPENAI_BASE_URL) ?? base.baseURL,
    homeDir: nonEmpty(env.MAILPILOT_HOME) ?? base.homeDir,
    instructionsFile: nonEmpty(env.MAILPILOT_INSTRUCTIONS_FILE) ?? base.instructionsFile,
    runtime: {
      ...baseRuntime,
      ...(modelTimeoutMs ? {modelTimeoutMs} : {}),
      ...(maxIterations ? {maxIterations} : {})
    },
    mailbox: {
      ...baseMailbox,
      userId: nonEmpty(env.MAILBOX_USER_ID) ?? baseMailbox.userId,
      tenantId: nonEmpty(env.TENANT_ID) ?? baseMailbox.tenantId,
      clientId: nonEmpty(env.CLIENT_ID) ?? baseMailbox.clientId,
      clientSecret: nonEmpty(env.CLIENT_SECRET) ?? baseMailbox.clientSecret,
      scope: nonEmpty(env.GRAPH_SCOPE) ?? baseMailbox.scope,
      graphBaseUrl: nonEmpty(env.GRAPH_API_BASE) ?? baseMailbox.graphBaseUrl
    },
    display: {
      ...baseDisplay,
      mode: nonEmpty(env.MAILPILOT_DISPLAY_MODE) ?? baseDisplay.mode
    }
  }

  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`Invalid configuration${result ? ` in ${result.filepath}` : ''}: ${issues.join('; ')}`)
  }
  return parsed.data
}

const SECRET_PLACEHOLDER = '********'

/** Config copy safe to print: secrets replaced by a placeholder. */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    mailbox: {
      ...config.mailbox,
      clientSecret: config.mailbox.clientSecret ? SECRET_PLACEHOLDER : undefined
    }
  }
}
