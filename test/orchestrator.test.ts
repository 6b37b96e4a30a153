import {describe, expect, it, vi} from 'vitest'
import {Conversation} from '../src/core/conversation.js'
import {
  ConversationStateError,
  MaxIterationsExceededError,
  ModelEndpointError
} from '../src/core/errors.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import {ConversationOrchestrator, type OrchestratorEvent} from '../src/core/orchestrator.js'
import type {MailboxOperations, MessageSummary} from '../src/mailbox/types.js'
import type {
  ChatMessage,
  LLMProvider,
  ProviderResponse,
  ProviderToolCall,
  ProviderToolDefinition
} from '../src/providers/types.js'
import {createMailboxToolRegistry} from '../src/tools/mailbox-tools.js'

type ScriptStep = ProviderResponse | Error

class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted'
  readonly model = 'scripted-model'
  readonly requests: {messages: ChatMessage[]; tools: readonly ProviderToolDefinition[]}[] = []
  private readonly steps: ScriptStep[]

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps]
  }

  async chat(messages: ChatMessage[], tools: readonly ProviderToolDefinition[] = []): Promise<ProviderResponse> {
    this.requests.push({messages, tools})
    const step = this.steps.shift()
    if (!step) throw new Error('script exhausted')
    if (step instanceof Error) throw step
    return step
  }
}

function answer(text: string): ProviderResponse {
  return {text, toolCalls: []}
}

function callTools(...toolCalls: ProviderToolCall[]): ProviderResponse {
  return {text: '', toolCalls}
}

const unreadMessage: MessageSummary = {
  id: 'msg-1',
  subject: 'Quarterly numbers',
  from: 'finance@example.com',
  receivedDateTime: '2025-03-01T08:00:00Z',
  isRead: false,
  preview: 'Please review before Friday.'
}

function fakeMailbox(overrides: Partial<MailboxOperations> = {}) {
  const ok = async () => ({success: true as const, payload: {}})
  const mailbox = {
    listEmails: vi.fn(async () => ({success: true as const, payload: [unreadMessage]})),
    sendEmail: vi.fn(async () => ({success: true as const, payload: {status: 'sent' as const, recipients: 1}})),
    createDraft: vi.fn(async () => ({success: true as const, payload: {draftId: 'draft-1'}})),
    updateDraft: vi.fn(async () => ({success: true as const, payload: {draftId: 'draft-1'}})),
    sendDraft: vi.fn(async () => ({success: true as const, payload: {status: 'sent' as const, draftId: 'draft-1'}})),
    listDrafts: vi.fn(async () => ({success: true as const, payload: []})),
    listCalendarEvents: vi.fn(async () => ({success: true as const, payload: []})),
    createCalendarEvent: vi.fn(async () => ({success: true as const, payload: {eventId: 'evt-1', webLink: null}})),
    getMailboxSettings: vi.fn(ok),
    updateMailboxSettings: vi.fn(ok),
    createForwardingRule: vi.fn(async () => ({success: true as const, payload: {ruleId: 'rule-1'}}))
  }
  const client: MailboxOperations = {...mailbox, ...overrides}
  return {mailbox, client}
}

function setup(steps: ScriptStep[], options: {overrides?: Partial<MailboxOperations>; maxIterations?: number} = {}) {
  const provider = new ScriptedProvider(steps)
  const {mailbox, client} = fakeMailbox(options.overrides)
  const events: OrchestratorEvent[] = []
  const bus = new InMemoryEventBus<OrchestratorEvent>()
  bus.subscribe((event) => {
    events.push(event)
  })
  const orchestrator = new ConversationOrchestrator({
    provider,
    registry: createMailboxToolRegistry(client),
    instructions: 'You manage one mailbox.',
    maxIterations: options.maxIterations,
    sessionId: 'test-session',
    bus
  })
  return {provider, mailbox, orchestrator, events, conversation: new Conversation()}
}

function lastMessage(messages: ChatMessage[] | undefined): ChatMessage | undefined {
  return messages?.at(-1)
}

describe('ConversationOrchestrator', () => {
  it('returns a direct answer verbatim and records two turns', async () => {
    const {provider, orchestrator, conversation, mailbox} = setup([answer('Hello! How can I help with your mail?')])

    const output = await orchestrator.runTurn(conversation, 'hi')

    expect(output).toBe('Hello! How can I help with your mail?')
    expect(conversation.turns).toEqual([
      {role: 'user', content: 'hi'},
      {role: 'assistant', content: 'Hello! How can I help with your mail?', toolCalls: []}
    ])
    expect(provider.requests).toHaveLength(1)
    expect(provider.requests[0]?.messages).toEqual([
      {role: 'system', content: 'You manage one mailbox.'},
      {role: 'user', content: 'hi'}
    ])
    expect(provider.requests[0]?.tools).toHaveLength(11)
    expect(mailbox.listEmails).not.toHaveBeenCalled()
    expect(orchestrator.state).toBe('answered')
  })

  it('executes a listEmails call and submits its result before answering', async () => {
    const {provider, orchestrator, conversation, mailbox} = setup([
      callTools({id: 'call_1', name: 'listEmails', input: {top: 5, filter: 'isRead eq false'}}),
      answer('You have one unread message from finance@example.com.')
    ])

    const output = await orchestrator.runTurn(conversation, 'Do I have unread mail?')

    expect(output).toBe('You have one unread message from finance@example.com.')
    expect(mailbox.listEmails).toHaveBeenCalledWith({top: 5, filter: 'isRead eq false'})
    expect(conversation.turns.map((turn) => turn.role)).toEqual(['user', 'assistant', 'tool', 'assistant'])
    expect(conversation.turns[2]).toEqual({
      role: 'tool',
      toolCallId: 'call_1',
      toolName: 'listEmails',
      input: {top: 5, filter: 'isRead eq false'},
      outcome: {ok: true, payload: [unreadMessage]}
    })
    expect(provider.requests).toHaveLength(2)
    expect(lastMessage(provider.requests[1]?.messages)).toEqual({
      role: 'tool',
      toolCallId: 'call_1',
      toolName: 'listEmails',
      content: JSON.stringify({ok: true, result: [unreadMessage]})
    })
  })

  it('passes a mailbox authentication failure back to the model as the tool result', async () => {
    const denied = 'AuthenticationError: Graph request failed (401): InvalidAuthenticationToken: Access token is empty.'
    const {provider, orchestrator, conversation} = setup(
      [
        callTools({id: 'call_1', name: 'listEmails', input: {}}),
        answer('I could not sign in to the mailbox.')
      ],
      {overrides: {listEmails: async () => ({success: false, kind: 'AuthenticationError', error: denied})}}
    )

    const output = await orchestrator.runTurn(conversation, 'check my mail')

    expect(output).toBe('I could not sign in to the mailbox.')
    expect(lastMessage(provider.requests[1]?.messages)).toEqual({
      role: 'tool',
      toolCallId: 'call_1',
      toolName: 'listEmails',
      content: JSON.stringify({ok: false, error: denied})
    })
  })

  it('reports invalid arguments to the model without calling the mailbox', async () => {
    const {orchestrator, conversation, mailbox} = setup([
      callTools({id: 'call_1', name: 'sendEmail', input: {to: ['dana@example.com'], body: 'See you at noon.'}}),
      answer('What subject should I use?')
    ])

    await orchestrator.runTurn(conversation, 'email Dana about lunch')

    expect(mailbox.sendEmail).not.toHaveBeenCalled()
    expect(conversation.turns[2]).toMatchObject({
      role: 'tool',
      outcome: {ok: false, error: 'ValidationError: Invalid arguments for sendEmail: subject: Required'}
    })
  })

  it('dispatches several calls from one response in order', async () => {
    const order: string[] = []
    const {orchestrator, conversation} = setup(
      [
        callTools(
          {id: 'call_a', name: 'listEmails', input: {top: 3}},
          {id: 'call_b', name: 'listDrafts', input: {}},
          {id: 'call_c', name: 'getMailboxSettings', input: {}}
        ),
        answer('Here is your overview.')
      ],
      {
        overrides: {
          listEmails: async () => {
            order.push('listEmails')
            return {success: true, payload: []}
          },
          listDrafts: async () => {
            order.push('listDrafts')
            return {success: true, payload: []}
          },
          getMailboxSettings: async () => {
            order.push('getMailboxSettings')
            return {success: true, payload: {timeZone: 'UTC'}}
          }
        }
      }
    )

    await orchestrator.runTurn(conversation, 'overview please')

    expect(order).toEqual(['listEmails', 'listDrafts', 'getMailboxSettings'])
    expect(
      conversation.turns.flatMap((turn) => (turn.role === 'tool' ? [turn.toolCallId] : []))
    ).toEqual(['call_a', 'call_b', 'call_c'])
  })

  it('answers unknown tools and malformed arguments with errors instead of failing', async () => {
    const {orchestrator, conversation} = setup([
      callTools(
        {id: 'call_1', name: 'deleteEverything', input: {}},
        {id: 'call_2', name: 'listEmails', input: {}, argumentsError: 'arguments must be a JSON object'}
      ),
      answer('Sorry, I cannot do that.')
    ])

    const output = await orchestrator.runTurn(conversation, 'wipe the mailbox')

    expect(output).toBe('Sorry, I cannot do that.')
    const outcomes = conversation.turns.flatMap((turn) => (turn.role === 'tool' ? [turn.outcome] : []))
    expect(outcomes).toEqual([
      {ok: false, error: 'UnknownToolError: Unknown tool: deleteEverything'},
      {ok: false, error: 'ValidationError: Invalid arguments for listEmails: arguments must be a JSON object'}
    ])
  })

  it('turns a throwing mailbox call into a tool error', async () => {
    const {orchestrator, conversation} = setup(
      [callTools({id: 'call_1', name: 'listDrafts', input: {}}), answer('The mailbox did not respond.')],
      {
        overrides: {
          listDrafts: async () => {
            throw new Error('socket closed')
          }
        }
      }
    )

    await orchestrator.runTurn(conversation, 'show drafts')

    expect(conversation.turns[2]).toMatchObject({outcome: {ok: false, error: 'listDrafts failed: socket closed'}})
  })

  it('stops after the iteration bound when the model keeps requesting tools', async () => {
    let counter = 0
    const provider: LLMProvider = {
      name: 'looping',
      model: 'looping-model',
      chat: vi.fn(async () => {
        counter += 1
        return callTools({id: `call_${counter}`, name: 'listDrafts', input: {}})
      })
    }
    const {client} = fakeMailbox()
    const events: OrchestratorEvent[] = []
    const bus = new InMemoryEventBus<OrchestratorEvent>()
    bus.on('turn_failed', (event) => {
      events.push(event)
    })
    const orchestrator = new ConversationOrchestrator({
      provider,
      registry: createMailboxToolRegistry(client),
      maxIterations: 3,
      sessionId: 'loop',
      bus
    })
    const conversation = new Conversation()

    await expect(orchestrator.runTurn(conversation, 'loop forever')).rejects.toThrow(MaxIterationsExceededError)

    expect(provider.chat).toHaveBeenCalledTimes(3)
    expect(conversation.length).toBe(7)
    expect(orchestrator.state).toBe('failed')
    expect(events).toEqual([
      {
        type: 'turn_failed',
        sessionId: 'loop',
        iteration: 3,
        reason: 'max_iterations',
        error: 'Stopped after 3 model round-trips without a final answer.'
      }
    ])
  })

  it('propagates model endpoint errors and keeps the conversation', async () => {
    const {orchestrator, conversation} = setup([
      callTools({id: 'call_1', name: 'listDrafts', input: {}}),
      new ModelEndpointError('Model endpoint error (status 500): upstream failed', {status: 500})
    ])

    await expect(orchestrator.runTurn(conversation, 'drafts?')).rejects.toThrow(
      'Model endpoint error (status 500): upstream failed'
    )

    expect(conversation.turns.map((turn) => turn.role)).toEqual(['user', 'assistant', 'tool'])
    expect(orchestrator.state).toBe('failed')
  })

  it('wraps unexpected provider failures as model endpoint errors', async () => {
    const {orchestrator, conversation} = setup([new Error('socket hang up')])

    const failure = await orchestrator.runTurn(conversation, 'hi').catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(ModelEndpointError)
    expect(failure).toHaveProperty('message', 'Model request failed: socket hang up')
    expect(conversation.length).toBe(1)
  })

  it('resumes a failed turn without adding user input', async () => {
    const {provider, orchestrator, conversation} = setup([
      new ModelEndpointError('Model request timed out after 45000ms'),
      answer('Back online.')
    ])

    await expect(orchestrator.runTurn(conversation, 'status?')).rejects.toThrow(ModelEndpointError)
    const output = await orchestrator.resumeTurn(conversation)

    expect(output).toBe('Back online.')
    expect(conversation.turns).toEqual([
      {role: 'user', content: 'status?'},
      {role: 'assistant', content: 'Back online.', toolCalls: []}
    ])
    expect(provider.requests[1]?.messages).toEqual(provider.requests[0]?.messages)
    await expect(orchestrator.resumeTurn(conversation)).rejects.toThrow(
      new ConversationStateError('Nothing to resume: the last turn already has an answer.')
    )
  })

  it('refuses to resume an empty conversation without calling the model', async () => {
    const {provider, orchestrator, conversation} = setup([answer('unused')])

    await expect(orchestrator.resumeTurn(conversation)).rejects.toThrow(
      new ConversationStateError('Nothing to resume: the conversation has no turns.')
    )
    expect(provider.requests).toEqual([])
  })

  it('publishes the turn lifecycle on the bus', async () => {
    const {orchestrator, conversation, events} = setup([
      callTools({id: 'call_1', name: 'listDrafts', input: {}}),
      answer('No drafts.')
    ])

    await orchestrator.runTurn(conversation, 'drafts?')

    expect(events.every((event) => event.sessionId === 'test-session')).toBe(true)
    expect(events.map((event) => (event.type === 'state' ? `state:${event.to}` : event.type))).toEqual([
      'turn_start',
      'model_request',
      'model_response',
      'state:awaiting_tool_dispatch',
      'tool_call',
      'tool_result',
      'state:awaiting_model',
      'model_request',
      'model_response',
      'state:answered',
      'final'
    ])
  })
})
