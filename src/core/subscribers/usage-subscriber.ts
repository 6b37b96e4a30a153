import type {OrchestratorEvent} from '../orchestrator.js'

/** USD per million tokens. */
export type ModelPrice = {input: number; output: number}

/** Approximate OpenAI list prices; dated snapshots match their base name. */
export const MODEL_PRICES: Readonly<Record<string, ModelPrice>> = {
  'gpt-4o': {input: 2.5, output: 10},
  'gpt-4o-mini': {input: 0.15, output: 0.6},
  'gpt-4.1': {input: 2, output: 8},
  'gpt-4.1-mini': {input: 0.4, output: 1.6},
  'gpt-4.1-nano': {input: 0.1, output: 0.4},
  o3: {input: 2, output: 8},
  'o4-mini': {input: 1.1, output: 4.4}
}

export function priceFor(
  model: string,
  prices: Readonly<Record<string, ModelPrice>> = MODEL_PRICES
): ModelPrice | undefined {
  if (Object.hasOwn(prices, model)) return prices[model]
  // longest base name wins, so gpt-4o-mini-2024-07-18 is not priced as gpt-4o
  const base = Object.keys(prices)
    .filter((name) => model.startsWith(`${name}-`))
    .sort((a, b) => b.length - a.length)[0]
  return base === undefined ? undefined : prices[base]
}

export function estimateCostUsd(
  usage: {promptTokens: number; completionTokens: number},
  price: ModelPrice | undefined
): number | null {
  if (!price || (usage.promptTokens === 0 && usage.completionTokens === 0)) return null
  return (usage.promptTokens * price.input + usage.completionTokens * price.output) / 1_000_000
}

export type UsageSummary = {
  sessionId: string
  model: string
  elapsedMs: number
  turns: number
  modelCalls: number
  toolCalls: number
  toolErrors: number
  failedTurns: number
  promptTokens: number
  completionTokens: number
  totalTokens: number
  modelMs: number
  /** Null when the model has no known price or no tokens were reported. */
  estimatedCostUsd: number | null
}

type UsageState = Omit<UsageSummary, 'elapsedMs' | 'estimatedCostUsd'> & {startedAtMs: number}

function emptyState(sessionId: string, model: string, startedAtMs: number): UsageState {
  return {
    sessionId,
    model,
    startedAtMs,
    turns: 0,
    modelCalls: 0,
    toolCalls: 0,
    toolErrors: 0,
    failedTurns: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    modelMs: 0
  }
}

/** Running per-session counters for `/usage` and the end-of-session line. */
export class UsageSubscriber {
  private readonly states = new Map<string, UsageState>()
  private readonly now: () => number
  private readonly prices: Readonly<Record<string, ModelPrice>>

  constructor(now: () => number = Date.now, prices: Readonly<Record<string, ModelPrice>> = MODEL_PRICES) {
    this.now = now
    this.prices = prices
  }

  handle(event: OrchestratorEvent): void {
    if (event.type === 'session_start') {
      this.states.set(event.sessionId, emptyState(event.sessionId, event.model, this.now()))
      return
    }

    const state = this.states.get(event.sessionId)
    if (!state) return

    switch (event.type) {
      case 'turn_start':
        state.turns += 1
        break
      case 'model_response':
        state.modelCalls += 1
        state.modelMs += event.durationMs
        if (event.usage) {
          state.promptTokens += event.usage.promptTokens
          state.completionTokens += event.usage.completionTokens
          state.totalTokens += event.usage.totalTokens
        }
        break
      case 'tool_result':
        state.toolCalls += 1
        if (!event.ok) state.toolErrors += 1
        break
      case 'turn_failed':
        state.failedTurns += 1
        break
      case 'session_end':
        this.states.delete(event.sessionId)
        break
    }
  }

  summary(sessionId: string): UsageSummary | undefined {
    const state = this.states.get(sessionId)
    if (!state) return undefined
    const {startedAtMs, ...counters} = state
    return {
      ...counters,
      elapsedMs: this.now() - startedAtMs,
      estimatedCostUsd: estimateCostUsd(counters, priceFor(counters.model, this.prices))
    }
  }
}

export function formatUsage(summary: UsageSummary): string {
  return [
    `turns=${summary.turns}`,
    `model_calls=${summary.modelCalls}`,
    `tool_calls=${summary.toolCalls}`,
    `tool_errors=${summary.toolErrors}`,
    `failed_turns=${summary.failedTurns}`,
    `tokens=${summary.totalTokens} (prompt ${summary.promptTokens}, completion ${summary.completionTokens})`,
    `model_time=${summary.modelMs}ms`,
    `elapsed=${summary.elapsedMs}ms`,
    `cost=${summary.estimatedCostUsd === null ? 'n/a' : `$${summary.estimatedCostUsd.toFixed(4)}`}`
  ].join(' ')
}
