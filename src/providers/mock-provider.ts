import type {ChatMessage, LLMProvider, ProviderResponse, ProviderToolDefinition} from './types.js'

/** Offline provider: never requests tools, echoes the latest user message. */
export class MockProvider implements LLMProvider {
  readonly name = 'mock'
  readonly model = 'mock'

  async chat(messages: ChatMessage[], tools: readonly ProviderToolDefinition[] = []): Promise<ProviderResponse> {
    const lastUser = messages.findLast((message) => message.role === 'user')
    if (!lastUser) return {text: 'No input provided.', toolCalls: []}
    return {text: `Mock response (${tools.length} tools available): ${lastUser.content}`, toolCalls: []}
  }
}
