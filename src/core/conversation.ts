import type {ProviderToolCall} from '../providers/types.js'
import {ConversationStateError} from './errors.js'
import {deepFreeze} from './freeze.js'

export type ToolCallRequest = ProviderToolCall

export type ToolOutcome = {ok: true; payload: unknown} | {ok: false; error: string}

export type UserTurn = {role: 'user'; content: string}

export type AssistantTurn = {
  role: 'assistant'
  content: string
  /** Empty when the model answered without requesting tools. */
  toolCalls: ToolCallRequest[]
}

export type ToolTurn = {
  role: 'tool'
  toolCallId: string
  toolName: string
  input: Record<string, unknown>
  outcome: ToolOutcome
}

export type Turn = UserTurn | AssistantTurn | ToolTurn

/**
 * Ordered, append-only record of one chat session.
 *
 * Tool turns must answer a request made by the latest assistant turn, and no
 * other turn may be added while such requests are unanswered. Stored turns
 * are frozen copies, so callers cannot edit history through `turns`.
 */
export class Conversation {
  private readonly entries: Turn[] = []

  append(turn: Turn): void {
    const pending = this.pendingToolCalls()

    if (turn.role === 'tool') {
      if (!pending.some((call) => call.id === turn.toolCallId)) {
        throw new ConversationStateError(
          `Tool result for '${turn.toolName}' references unknown or already answered call ${turn.toolCallId}`
        )
      }
    } else if (pending.length > 0) {
      throw new ConversationStateError(
        `Cannot append a ${turn.role} turn while ${pending.length} tool call(s) are unanswered`
      )
    }

    this.entries.push(deepFreeze(structuredClone(turn)))
  }

  get turns(): Turn[] {
    return [...this.entries]
  }

  get length(): number {
    return this.entries.length
  }

  /** Requests from the latest assistant turn that have no tool turn yet. */
  pendingToolCalls(): ToolCallRequest[] {
    const answered = new Set<string>()
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const turn = this.entries[index]
      if (turn.role === 'tool') {
        answered.add(turn.toolCallId)
        continue
      }
      if (turn.role === 'assistant') {
        return turn.toolCalls.filter((call) => !answered.has(call.id))
      }
      return []
    }
    return []
  }
}
