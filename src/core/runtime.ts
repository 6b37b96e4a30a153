import {randomUUID} from 'node:crypto'
import {loadInstructions} from '../config/instructions.js'
import {loadConfig} from '../config/load-config.js'
import {getSessionLogPath} from '../config/paths.js'
import type {AppConfig} from '../config/schema.js'
import {GraphMailboxClient} from '../mailbox/graph-client.js'
import {ClientCredentialsTokenProvider} from '../mailbox/token.js'
import type {MailboxOperations} from '../mailbox/types.js'
import {MockProvider} from '../providers/mock-provider.js'
import {OpenAIProvider} from '../providers/openai-provider.js'
import type {LLMProvider} from '../providers/types.js'
import {createMailboxToolRegistry} from '../tools/mailbox-tools.js'
import type {ToolRegistry} from '../tools/registry.js'
import {ConfigurationError} from './errors.js'
import type {EventBus} from './event-bus.js'
import {ConversationOrchestrator, type OrchestratorEvent} from './orchestrator.js'

export const DEFAULT_MODEL = 'gpt-4o-mini'

export type MailpilotRuntime = {
  sessionId: string
  logPath: string
  config: AppConfig
  provider: LLMProvider
  registry: ToolRegistry
  orchestrator: ConversationOrchestrator
  instructions: string
}

export type CreateRuntimeOptions = {
  config?: AppConfig
  bus?: EventBus<OrchestratorEvent>
  env?: NodeJS.ProcessEnv
  /** Overrides for tests and embedding; built from config when absent. */
  provider?: LLMProvider
  mailbox?: MailboxOperations
}

export function providerFromConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): LLMProvider {
  if (config.provider === 'mock') return new MockProvider()

  const apiKey = env.OPENAI_API_KEY?.trim()
  if (!apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is missing. Set it in your environment or .env file.', [
      'OPENAI_API_KEY'
    ])
  }

  return new OpenAIProvider({
    apiKey,
    model: config.model ?? DEFAULT_MODEL,
    baseUrl: config.baseURL,
    timeoutMs: config.runtime.modelTimeoutMs
  })
}

export function mailboxClientFromConfig(config: AppConfig): GraphMailboxClient {
  const {userId, tenantId, clientId, clientSecret} = config.mailbox
  const missing = [
    ...(userId ? [] : ['MAILBOX_USER_ID']),
    ...(tenantId ? [] : ['TENANT_ID']),
    ...(clientId ? [] : ['CLIENT_ID']),
    ...(clientSecret ? [] : ['CLIENT_SECRET'])
  ]
  if (!userId || !tenantId || !clientId || !clientSecret) {
    throw new ConfigurationError('Mailbox credentials are incomplete.', missing)
  }

  const tokenProvider = new ClientCredentialsTokenProvider({
    tenantId,
    clientId,
    clientSecret,
    scope: config.mailbox.scope,
    authorityHost: config.mailbox.authorityHost,
    timeoutMs: config.mailbox.requestTimeoutMs
  })

  return new GraphMailboxClient({
    userId,
    tokenProvider,
    baseUrl: config.mailbox.graphBaseUrl,
    timeoutMs: config.mailbox.requestTimeoutMs
  })
}

/** Resolves config and credentials once and wires one conversation's collaborators. */
export async function createRuntime(options: CreateRuntimeOptions = {}): Promise<MailpilotRuntime> {
  const config = options.config ?? (await loadConfig({env: options.env}))
  const provider = options.provider ?? providerFromConfig(config, options.env)
  const registry = createMailboxToolRegistry(options.mailbox ?? mailboxClientFromConfig(config))
  const instructions = await loadInstructions(config)
  const sessionId = randomUUID()
  const logPath = getSessionLogPath(sessionId, config.homeDir)

  const orchestrator = new ConversationOrchestrator({
    provider,
    registry,
    instructions,
    maxIterations: config.runtime.maxIterations,
    sessionId,
    bus: options.bus
  })

  options.bus?.publish({
    type: 'session_start',
    sessionId,
    provider: provider.name,
    model: provider.model,
    tools: registry.size,
    logPath
  })

  return {sessionId, logPath, config, provider, registry, orchestrator, instructions}
}

export function closeRuntime(runtime: MailpilotRuntime, bus?: EventBus<OrchestratorEvent>): void {
  bus?.publish({type: 'session_end', sessionId: runtime.sessionId})
}
