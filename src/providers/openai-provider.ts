import {randomUUID} from 'node:crypto'
import OpenAI from 'openai'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {ModelEndpointError, errorMessage} from '../core/errors.js'
import type {
  ChatMessage,
  LLMProvider,
  ProviderResponse,
  ProviderToolCall,
  ProviderToolDefinition,
  ProviderUsage
} from './types.js'

type OpenAIProviderOptions = {
  apiKey: string
  model: string
  baseUrl?: string
  timeoutMs?: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function safeJsonSnippet(value: unknown): string {
  try {
    return JSON.stringify(value).slice(0, 500)
  } catch {
    return '[unserializable response]'
  }
}

function firstChoice(data: unknown): Record<string, unknown> | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined
  const choice: unknown = data.choices[0]
  return isRecord(choice) ? choice : undefined
}

function firstMessage(data: unknown): Record<string, unknown> | undefined {
  const message = firstChoice(data)?.message
  return isRecord(message) ? message : undefined
}

function extractText(data: unknown): string | undefined {
  const messageContent = firstMessage(data)?.content
  if (typeof messageContent === 'string' && messageContent.trim()) {
    return messageContent
  }

  if (Array.isArray(messageContent)) {
    const parts: unknown[] = messageContent
    const joined = parts
      .map((part) => {
        if (typeof part === 'string') return part
        if (isRecord(part) && typeof part.text === 'string') return part.text
        return ''
      })
      .join('')
      .trim()
    if (joined) return joined
  }

  const textField = firstChoice(data)?.text
  if (typeof textField === 'string' && textField.trim()) {
    return textField
  }

  if (isRecord(data) && typeof data.output_text === 'string' && data.output_text.trim()) {
    return data.output_text
  }

  return undefined
}

function parseArguments(raw: unknown): Pick<ProviderToolCall, 'input' | 'argumentsError' | 'rawArguments'> {
  if (isRecord(raw)) return {input: raw}
  if (typeof raw !== 'string' || !raw.trim()) return {input: {}}

  try {
    const parsed: unknown = JSON.parse(raw)
    if (isRecord(parsed)) return {input: parsed}
    return {input: {}, argumentsError: 'arguments must be a JSON object', rawArguments: raw}
  } catch (error) {
    return {input: {}, argumentsError: `arguments are not valid JSON (${errorMessage(error)})`, rawArguments: raw}
  }
}

function replayArguments(call: ProviderToolCall): string {
  if (call.argumentsError !== undefined && call.rawArguments !== undefined) return call.rawArguments
  return JSON.stringify(call.input)
}

function parseToolCalls(data: unknown): ProviderToolCall[] {
  const rawCalls = firstMessage(data)?.tool_calls
  if (!Array.isArray(rawCalls)) return []
  const entries: unknown[] = rawCalls

  const parsed: ProviderToolCall[] = []
  const seenIds = new Set<string>()
  for (const call of entries) {
    if (!isRecord(call) || call.type !== 'function' || !isRecord(call.function)) continue
    const name = call.function.name
    if (typeof name !== 'string' || !name) continue

    // Some OpenAI-compatible backends omit or repeat ids; every tool message needs its own.
    const id = typeof call.id === 'string' && call.id && !seenIds.has(call.id) ? call.id : `call_${randomUUID()}`
    seenIds.add(id)
    parsed.push({id, name, ...parseArguments(call.function.arguments)})
  }

  return parsed
}

function parseUsage(data: unknown): ProviderUsage | undefined {
  if (!isRecord(data) || !isRecord(data.usage)) return undefined
  const {prompt_tokens: promptTokens, completion_tokens: completionTokens, total_tokens: totalTokens} = data.usage
  if (typeof promptTokens !== 'number' || typeof completionTokens !== 'number') return undefined
  return {
    promptTokens,
    completionTokens,
    totalTokens: typeof totalTokens === 'number' ? totalTokens : promptTokens + completionTokens
  }
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return {role: 'system', content: message.content}
    case 'user':
      return {role: 'user', content: message.content}
    case 'assistant':
      if (!message.toolCalls || message.toolCalls.length === 0) {
        return {role: 'assistant', content: message.content}
      }
      return {
        role: 'assistant',
        content: message.content || null,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: {name: call.name, arguments: replayArguments(call)}
        }))
      }
    case 'tool':
      return {role: 'tool', content: message.content, tool_call_id: message.toolCallId}
  }
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai'
  readonly model: string
  private readonly client: OpenAI
  private readonly timeoutMs: number

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model
    this.timeoutMs = options.timeoutMs ?? 45_000
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    const baseURL = rawBaseUrl.replace(/\/+$/, '')
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      maxRetries: 0
    })
  }

  private async createWithTimeout(request: ChatCompletionCreateParamsNonStreaming): Promise<unknown> {
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new ModelEndpointError(`Model request timed out after ${this.timeoutMs}ms`))
      }, this.timeoutMs)
      // Prevent timers from keeping process alive on some runtimes.
      timer.unref?.()
    })

    try {
      return await Promise.race([this.client.chat.completions.create(request, {signal: controller.signal}), timeoutPromise])
    } finally {
      clearTimeout(timer)
    }
  }

  async chat(messages: ChatMessage[], tools: readonly ProviderToolDefinition[] = []): Promise<ProviderResponse> {
    const mappedTools: ChatCompletionTool[] = tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema
      }
    }))

    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      ...(mappedTools.length > 0 ? {tools: mappedTools, tool_choice: 'auto' as const} : {})
    }

    let completion: unknown
    try {
      completion = await this.createWithTimeout(request)
    } catch (error) {
      if (error instanceof ModelEndpointError) throw error
      if (error instanceof OpenAI.APIError) {
        throw new ModelEndpointError(`Model endpoint error (status ${error.status ?? 'none'}): ${error.message}`, {
          status: error.status,
          cause: error
        })
      }
      throw new ModelEndpointError(`Model request failed: ${errorMessage(error)}`, {cause: error})
    }

    const content = extractText(completion)
    const toolCalls = parseToolCalls(completion)
    if (!content && toolCalls.length === 0) {
      throw new ModelEndpointError(
        `Model returned empty completion payload. Response snippet: ${safeJsonSnippet(completion)}`
      )
    }

    return {
      text: content ?? '',
      toolCalls,
      usage: parseUsage(completion)
    }
  }

  async healthCheck(): Promise<{ok: boolean; message?: string}> {
    try {
      await this.chat([{role: 'user', content: 'ping'}])
      return {ok: true}
    } catch (error) {
      return {
        ok: false,
        message: errorMessage(error)
      }
    }
  }
}
