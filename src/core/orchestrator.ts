import type {ChatMessage, LLMProvider, ProviderResponse, ProviderUsage} from '../providers/types.js'
import type {RegisteredTool, ToolRegistry} from '../tools/registry.js'
import type {Conversation, ToolCallRequest, ToolOutcome, Turn} from './conversation.js'
import {
  ConversationStateError,
  MaxIterationsExceededError,
  ModelEndpointError,
  UnknownToolError,
  ValidationError,
  errorMessage
} from './errors.js'
import type {EventBus} from './event-bus.js'

export const DEFAULT_MAX_ITERATIONS = 10

export type OrchestratorState = 'awaiting_model' | 'awaiting_tool_dispatch' | 'answered' | 'failed'

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  awaiting_model: ['answered', 'awaiting_tool_dispatch', 'failed'],
  awaiting_tool_dispatch: ['awaiting_model', 'failed'],
  answered: [],
  failed: []
}

type OrchestratorEventBody =
  | {type: 'session_start'; provider: string; model: string; tools: number; logPath?: string}
  | {type: 'session_end'}
  | {type: 'turn_start'; input: string}
  | {type: 'state'; from: OrchestratorState; to: OrchestratorState}
  | {type: 'model_request'; iteration: number; turns: number}
  | {
      type: 'model_response'
      iteration: number
      content: string
      toolCalls: number
      usage?: ProviderUsage
      durationMs: number
    }
  | {type: 'tool_call'; iteration: number; callId: string; tool: string; input: Record<string, unknown>}
  | {type: 'tool_result'; iteration: number; callId: string; tool: string; ok: boolean; output: string; durationMs: number}
  | {type: 'final'; iteration: number; content: string}
  | {type: 'turn_failed'; iteration: number; reason: 'model_endpoint' | 'max_iterations'; error: string}

export type OrchestratorEvent = OrchestratorEventBody & {sessionId: string}

export type OrchestratorOptions = {
  provider: LLMProvider
  registry: ToolRegistry
  /** Developer instructions sent as the system message of every request. */
  instructions?: string
  maxIterations?: number
  sessionId?: string
  bus?: EventBus<OrchestratorEvent>
}

export function renderToolOutcome(outcome: ToolOutcome): string {
  return JSON.stringify(outcome.ok ? {ok: true, result: outcome.payload} : {ok: false, error: outcome.error})
}

/** Renders turns into the provider's message format, instructions first. */
export function toChatMessages(turns: readonly Turn[], instructions?: string): ChatMessage[] {
  const messages: ChatMessage[] = instructions?.trim() ? [{role: 'system', content: instructions.trim()}] : []
  for (const turn of turns) {
    switch (turn.role) {
      case 'user':
        messages.push({role: 'user', content: turn.content})
        break
      case 'assistant':
        messages.push({
          role: 'assistant',
          content: turn.content,
          ...(turn.toolCalls.length > 0 ? {toolCalls: turn.toolCalls} : {})
        })
        break
      case 'tool':
        messages.push({
          role: 'tool',
          toolCallId: turn.toolCallId,
          toolName: turn.toolName,
          content: renderToolOutcome(turn.outcome)
        })
        break
    }
  }
  return messages
}

class TurnStateMachine {
  private current: OrchestratorState = 'awaiting_model'
  private readonly onTransition: (from: OrchestratorState, to: OrchestratorState) => void

  constructor(onTransition: (from: OrchestratorState, to: OrchestratorState) => void) {
    this.onTransition = onTransition
  }

  get state(): OrchestratorState {
    return this.current
  }

  transition(to: OrchestratorState): void {
    const from = this.current
    if (!TRANSITIONS[from].includes(to)) {
      throw new ConversationStateError(`Illegal orchestrator transition ${from} -> ${to}`)
    }
    this.current = to
    this.onTransition(from, to)
  }
}

/**
 * Drives one user request to a final answer: submits the conversation to the
 * model, executes requested tool calls in order, and repeats up to a fixed
 * number of model round-trips.
 */
export class ConversationOrchestrator {
  readonly maxIterations: number
  readonly sessionId: string
  private readonly provider: LLMProvider
  private readonly registry: ToolRegistry
  private readonly instructions?: string
  private readonly bus?: EventBus<OrchestratorEvent>
  private lastState?: OrchestratorState

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider
    this.registry = options.registry
    this.instructions = options.instructions
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS
    this.sessionId = options.sessionId ?? 'default'
    this.bus = options.bus
  }

  /** State reached by the most recent turn; undefined before the first one. */
  get state(): OrchestratorState | undefined {
    return this.lastState
  }

  async runTurn(conversation: Conversation, userInput: string): Promise<string> {
    conversation.append({role: 'user', content: userInput})
    this.publish({type: 'turn_start', input: userInput})
    return this.drive(conversation)
  }

  /**
   * Continues a turn that failed before the model answered, without adding
   * user input. The conversation must not end with an assistant answer.
   */
  async resumeTurn(conversation: Conversation): Promise<string> {
    const last = conversation.turns.at(-1)
    if (!last) {
      throw new ConversationStateError('Nothing to resume: the conversation has no turns.')
    }
    if (last.role === 'assistant') {
      throw new ConversationStateError('Nothing to resume: the last turn already has an answer.')
    }
    return this.drive(conversation)
  }

  private async drive(conversation: Conversation): Promise<string> {
    this.lastState = 'awaiting_model'
    const machine = new TurnStateMachine((from, to) => {
      this.lastState = to
      this.publish({type: 'state', from, to})
    })

    for (let iteration = 1; iteration <= this.maxIterations; iteration += 1) {
      if (machine.state === 'awaiting_tool_dispatch') machine.transition('awaiting_model')

      const response = await this.requestModel(conversation, iteration, machine)
      if (response.toolCalls.length === 0) {
        conversation.append({role: 'assistant', content: response.text, toolCalls: []})
        machine.transition('answered')
        this.publish({type: 'final', iteration, content: response.text})
        return response.text
      }

      conversation.append({role: 'assistant', content: response.text, toolCalls: response.toolCalls})
      machine.transition('awaiting_tool_dispatch')
      for (const call of response.toolCalls) {
        const outcome = await this.dispatch(call, iteration)
        conversation.append({
          role: 'tool',
          toolCallId: call.id,
          toolName: call.name,
          input: call.input,
          outcome
        })
      }
    }

    const error = new MaxIterationsExceededError(this.maxIterations)
    machine.transition('failed')
    this.publish({type: 'turn_failed', iteration: this.maxIterations, reason: 'max_iterations', error: error.message})
    throw error
  }

  private async requestModel(
    conversation: Conversation,
    iteration: number,
    machine: TurnStateMachine
  ): Promise<ProviderResponse> {
    this.publish({type: 'model_request', iteration, turns: conversation.length})
    const startedAt = Date.now()
    try {
      const response = await this.provider.chat(
        toChatMessages(conversation.turns, this.instructions),
        this.registry.listDefinitions()
      )
      this.publish({
        type: 'model_response',
        iteration,
        content: response.text,
        toolCalls: response.toolCalls.length,
        usage: response.usage,
        durationMs: Date.now() - startedAt
      })
      return response
    } catch (error) {
      const failure =
        error instanceof ModelEndpointError
          ? error
          : new ModelEndpointError(`Model request failed: ${errorMessage(error)}`, {cause: error})
      machine.transition('failed')
      this.publish({type: 'turn_failed', iteration, reason: 'model_endpoint', error: failure.message})
      throw failure
    }
  }

  private async dispatch(call: ToolCallRequest, iteration: number): Promise<ToolOutcome> {
    this.publish({type: 'tool_call', iteration, callId: call.id, tool: call.name, input: call.input})
    const startedAt = Date.now()
    const outcome = await this.execute(call)
    this.publish({
      type: 'tool_result',
      iteration,
      callId: call.id,
      tool: call.name,
      ok: outcome.ok,
      output: renderToolOutcome(outcome),
      durationMs: Date.now() - startedAt
    })
    return outcome
  }

  private async execute(call: ToolCallRequest): Promise<ToolOutcome> {
    let tool: RegisteredTool
    try {
      tool = this.registry.resolve(call.name)
    } catch (error) {
      if (error instanceof UnknownToolError) return {ok: false, error: `${error.name}: ${error.message}`}
      throw error
    }

    if (call.argumentsError) {
      const invalid = new ValidationError(call.name, [call.argumentsError])
      return {ok: false, error: `${invalid.name}: ${invalid.message}`}
    }

    const prepared = tool.prepare(call.input)
    if (!prepared.ok) {
      return {ok: false, error: `${prepared.error.name}: ${prepared.error.message}`}
    }

    try {
      const result = await prepared.execute()
      return result.success ? {ok: true, payload: result.payload} : {ok: false, error: result.error}
    } catch (error) {
      return {ok: false, error: `${call.name} failed: ${errorMessage(error)}`}
    }
  }

  private publish(event: OrchestratorEventBody): void {
    this.bus?.publish({...event, sessionId: this.sessionId})
  }
}
