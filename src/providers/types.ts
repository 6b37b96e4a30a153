export type ChatMessage =
  | {role: 'system' | 'user'; content: string}
  | {
      role: 'assistant'
      content: string
      /** Tool calls the model requested on this turn; replayed verbatim so every tool message has its request. */
      toolCalls?: ProviderToolCall[]
    }
  | {role: 'tool'; content: string; toolCallId: string; toolName: string}

export type ProviderToolDefinition = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

export type ProviderToolCall = {
  id: string
  name: string
  input: Record<string, unknown>
  /** Set when the model sent arguments that are not a JSON object. */
  argumentsError?: string
  /** The argument text as the model sent it, kept alongside `argumentsError` for replay. */
  rawArguments?: string
}

export type ProviderUsage = {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export type ProviderResponse = {
  text: string
  toolCalls: ProviderToolCall[]
  usage?: ProviderUsage
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  chat(messages: ChatMessage[], tools?: readonly ProviderToolDefinition[]): Promise<ProviderResponse>
}
