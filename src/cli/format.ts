import type {DisplayMode} from '../config/schema.js'
import type {Turn} from '../core/conversation.js'
import {renderToolOutcome, type OrchestratorEvent} from '../core/orchestrator.js'

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`
}

/** Truncates to `max` characters, backing up to the last space when it is near the cut. */
export function shorten(text: string, max: number): string {
  if (text.length <= max) return text
  let cut = text.slice(0, max)
  const lastSpace = cut.lastIndexOf(' ')
  if (lastSpace > max * 0.8) cut = cut.slice(0, lastSpace)
  return `${cut}...`
}

const VERBOSE_EVENTS: ReadonlySet<OrchestratorEvent['type']> = new Set(['tool_call', 'tool_result', 'turn_failed'])

/**
 * One display line for an event, or undefined when the mode hides it.
 * Final answers are printed by the commands themselves and never rendered here.
 */
export function eventLine(event: OrchestratorEvent, mode: DisplayMode, maxContentLength: number): string | undefined {
  if (mode === 'clean' || event.type === 'final') return undefined
  if (mode === 'verbose' && !VERBOSE_EVENTS.has(event.type)) return undefined

  switch (event.type) {
    case 'session_start':
      return `SESSION_START session=${event.sessionId} provider=${event.provider} model=${event.model} tools=${event.tools}`
    case 'session_end':
      return `SESSION_END session=${event.sessionId}`
    case 'turn_start':
      return `TURN_START ${shorten(event.input, maxContentLength)}`
    case 'state':
      return `STATE ${event.from} -> ${event.to}`
    case 'model_request':
      return `MODEL_REQUEST iteration=${event.iteration} turns=${event.turns}`
    case 'model_response': {
      const tokens = event.usage ? ` tokens=${event.usage.totalTokens}` : ''
      const head = `MODEL_RESPONSE iteration=${event.iteration} tool_calls=${event.toolCalls}${tokens} ${event.durationMs}ms`
      return event.content ? `${head}\n${shorten(event.content, maxContentLength)}` : head
    }
    case 'tool_call':
      return `TOOL_CALL iteration=${event.iteration} tool=${event.tool} input=${shorten(JSON.stringify(event.input), maxContentLength)}`
    case 'tool_result': {
      const timing = mode === 'debug' ? ` ${event.durationMs}ms` : ''
      return `TOOL_RESULT iteration=${event.iteration} tool=${event.tool} ok=${event.ok}${timing}\n${shorten(event.output, maxContentLength)}`
    }
    case 'turn_failed':
      return `TURN_FAILED iteration=${event.iteration} reason=${event.reason} ${event.error}`
  }
}

/** Plain-text history line for `/history`. */
export function turnLine(turn: Turn, maxContentLength: number): string {
  switch (turn.role) {
    case 'user':
      return `user> ${shorten(turn.content, maxContentLength)}`
    case 'assistant': {
      const calls = turn.toolCalls.map((call) => call.name).join(', ')
      const content = shorten(turn.content, maxContentLength)
      return calls ? `assistant> [calls ${calls}]${content ? ` ${content}` : ''}` : `assistant> ${content}`
    }
    case 'tool':
      return `tool(${turn.toolName})> ${shorten(renderToolOutcome(turn.outcome), maxContentLength)}`
  }
}
