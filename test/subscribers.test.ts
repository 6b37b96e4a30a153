import {mkdtemp, readFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import type {OrchestratorEvent} from '../src/core/orchestrator.js'
import {SessionLogSubscriber} from '../src/core/subscribers/session-log-subscriber.js'
import {UsageSubscriber, estimateCostUsd, formatUsage, priceFor} from '../src/core/subscribers/usage-subscriber.js'

const sessionStart = (logPath?: string): OrchestratorEvent => ({
  type: 'session_start',
  sessionId: 'session-1',
  provider: 'mock',
  model: 'mock',
  tools: 11,
  logPath
})

describe('SessionLogSubscriber', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mailpilot-log-'))
  })

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true})
  })

  it('writes one JSON line per event of a started session', async () => {
    const logPath = join(dir, 'logs', 'session-1.jsonl')
    const subscriber = new SessionLogSubscriber()

    await subscriber.handle({type: 'turn_start', sessionId: 'session-1', input: 'ignored before start'})
    await subscriber.handle(sessionStart(logPath))
    await subscriber.handle({type: 'turn_start', sessionId: 'session-1', input: 'hello'})
    await subscriber.handle({type: 'session_end', sessionId: 'session-1'})
    await subscriber.handle({type: 'turn_start', sessionId: 'session-1', input: 'ignored after end'})
    await subscriber.flush()

    const records = (await readFile(logPath, 'utf8'))
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line))

    expect(records).toEqual([
      {ts: expect.any(String), type: 'session_start', provider: 'mock', model: 'mock', tools: 11, logPath},
      {ts: expect.any(String), type: 'turn_start', input: 'hello'},
      {ts: expect.any(String), type: 'session_end'}
    ])
  })

  it('reports write failures instead of throwing', async () => {
    const onWriteError = vi.fn()
    const subscriber = new SessionLogSubscriber({onWriteError})
    // a directory cannot be appended to
    await subscriber.handle(sessionStart(dir))
    await subscriber.flush()

    expect(onWriteError).toHaveBeenCalledOnce()
    expect(onWriteError.mock.calls[0]?.[1]).toBe(dir)
  })
})

describe('UsageSubscriber', () => {
  it('accumulates model, tool and token counters per session', () => {
    let now = 1_000
    const usage = new UsageSubscriber(() => now)
    const events: OrchestratorEvent[] = [
      sessionStart(),
      {type: 'turn_start', sessionId: 'session-1', input: 'hi'},
      {
        type: 'model_response',
        sessionId: 'session-1',
        iteration: 1,
        content: '',
        toolCalls: 2,
        usage: {promptTokens: 100, completionTokens: 20, totalTokens: 120},
        durationMs: 300
      },
      {type: 'tool_result', sessionId: 'session-1', iteration: 1, callId: 'a', tool: 'listEmails', ok: true, output: '', durationMs: 5},
      {type: 'tool_result', sessionId: 'session-1', iteration: 1, callId: 'b', tool: 'listDrafts', ok: false, output: '', durationMs: 5},
      {type: 'model_response', sessionId: 'session-1', iteration: 2, content: 'done', toolCalls: 0, durationMs: 200},
      {type: 'turn_failed', sessionId: 'session-1', iteration: 2, reason: 'model_endpoint', error: 'boom'},
      {type: 'turn_start', sessionId: 'other-session', input: 'not tracked'}
    ]

    for (const event of events) usage.handle(event)
    now = 4_500

    const summary = usage.summary('session-1')
    expect(summary).toEqual({
      sessionId: 'session-1',
      model: 'mock',
      elapsedMs: 3_500,
      turns: 1,
      modelCalls: 2,
      toolCalls: 2,
      toolErrors: 1,
      failedTurns: 1,
      promptTokens: 100,
      completionTokens: 20,
      totalTokens: 120,
      modelMs: 500,
      estimatedCostUsd: null
    })
    expect(usage.summary('other-session')).toBeUndefined()
    if (summary) {
      expect(formatUsage(summary)).toBe(
        'turns=1 model_calls=2 tool_calls=2 tool_errors=1 failed_turns=1 tokens=120 (prompt 100, completion 20) model_time=500ms elapsed=3500ms cost=n/a'
      )
    }

    usage.handle({type: 'session_end', sessionId: 'session-1'})
    expect(usage.summary('session-1')).toBeUndefined()
  })

  it('estimates cost from the session model, matching dated snapshots to their base price', () => {
    const usage = new UsageSubscriber(() => 0)
    usage.handle({type: 'session_start', sessionId: 'priced', provider: 'openai', model: 'gpt-4o-mini-2024-07-18', tools: 11})
    usage.handle({
      type: 'model_response',
      sessionId: 'priced',
      iteration: 1,
      content: 'done',
      toolCalls: 0,
      usage: {promptTokens: 100_000, completionTokens: 20_000, totalTokens: 120_000},
      durationMs: 10
    })

    const summary = usage.summary('priced')

    expect(summary?.estimatedCostUsd).toBeCloseTo(0.027, 10)
    if (summary) expect(formatUsage(summary)).toMatch(/ cost=\$0\.0270$/)
  })

  it('has no estimate for an unpriced model or an empty usage record', () => {
    expect(priceFor('gpt-4o')).toEqual({input: 2.5, output: 10})
    expect(priceFor('gpt-4o-mini')).toEqual({input: 0.15, output: 0.6})
    expect(priceFor('llama3')).toBeUndefined()
    expect(estimateCostUsd({promptTokens: 10, completionTokens: 5}, undefined)).toBeNull()
    expect(estimateCostUsd({promptTokens: 0, completionTokens: 0}, {input: 1, output: 1})).toBeNull()
    expect(estimateCostUsd({promptTokens: 1_000_000, completionTokens: 0}, {input: 2, output: 8})).toBe(2)
  })
})
