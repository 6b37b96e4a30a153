import {z} from 'zod'
import {
  AuthenticationError,
  MailboxOperationError,
  NotFoundError,
  RemoteServiceError,
  errorMessage
} from '../core/errors.js'
import type {
  CreateCalendarEventParams,
  CreateDraftParams,
  CreateForwardingRuleParams,
  ListCalendarEventsParams,
  ListDraftsParams,
  ListEmailsParams,
  SendDraftParams,
  SendEmailParams,
  UpdateDraftParams,
  UpdateMailboxSettingsParams
} from './schemas.js'
import type {TokenProvider} from './token.js'
import type {
  EventSummary,
  MailboxOperationResult,
  MailboxOperations,
  MailboxSettings,
  MessageSummary
} from './types.js'

type HttpMethod = 'GET' | 'POST' | 'PATCH'

type RequestOptions = {
  query?: Record<string, string | number | undefined>
  body?: unknown
}

export type GraphMailboxClientOptions = {
  userId: string
  tokenProvider: TokenProvider
  baseUrl?: string
  timeoutMs?: number
}

const MESSAGE_SELECT = 'id,subject,from,receivedDateTime,isRead,bodyPreview'
const EVENT_SELECT = 'id,subject,start,end,location'
const PREVIEW_LENGTH = 100

const graphMessageSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  from: z
    .object({emailAddress: z.object({address: z.string().nullish()}).nullish()})
    .nullish(),
  receivedDateTime: z.string().nullish(),
  isRead: z.boolean().nullish(),
  bodyPreview: z.string().nullish()
})

const graphDateTimeSchema = z.object({dateTime: z.string().nullish(), timeZone: z.string().nullish()}).nullish()

const graphEventSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  start: graphDateTimeSchema,
  end: graphDateTimeSchema,
  location: z.object({displayName: z.string().nullish()}).nullish(),
  webLink: z.string().nullish()
})

const createdResourceSchema = z.object({id: z.string()})
const settingsSchema = z.record(z.unknown())

function collection<T extends z.ZodTypeAny>(item: T) {
  return z.object({value: z.array(item)})
}

function parseGraph<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw new RemoteServiceError(`Unexpected ${what} response${where}: ${issue?.message ?? 'invalid shape'}`)
  }
  return result.data
}

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text
}

function toMessageSummary(message: z.output<typeof graphMessageSchema>): MessageSummary {
  return {
    id: message.id,
    subject: message.subject || '(no subject)',
    from: message.from?.emailAddress?.address ?? 'unknown',
    receivedDateTime: message.receivedDateTime ?? null,
    isRead: message.isRead ?? false,
    preview: preview(message.bodyPreview ?? '')
  }
}

function toEventSummary(event: z.output<typeof graphEventSchema>): EventSummary {
  return {
    id: event.id,
    subject: event.subject || '(no subject)',
    start: event.start?.dateTime ?? null,
    end: event.end?.dateTime ?? null,
    timeZone: event.start?.timeZone ?? null,
    location: event.location?.displayName || null
  }
}

function toRecipients(addresses: readonly string[]) {
  return addresses.map((address) => ({emailAddress: {address}}))
}

function withoutODataAnnotations(settings: MailboxSettings): MailboxSettings {
  return Object.fromEntries(Object.entries(settings).filter(([key]) => !key.startsWith('@odata')))
}

function graphErrorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body)
    const detail = z.object({error: z.object({code: z.string().optional(), message: z.string()})}).safeParse(parsed)
    if (detail.success) {
      const {code, message} = detail.data.error
      return code ? `${code}: ${message}` : message
    }
  } catch {
    // not JSON; report the raw body below
  }
  return body.slice(0, 300) || '(empty response)'
}

/** Maps a non-2xx Graph response onto the mailbox error taxonomy. */
export function graphError(status: number, body: string): MailboxOperationError {
  const detail = `Graph request failed (${status}): ${graphErrorDetail(body)}`
  if (status === 401 || status === 403) return new AuthenticationError(detail, {status})
  if (status === 404) return new NotFoundError(detail, {status})
  return new RemoteServiceError(detail, {status})
}

/**
 * Microsoft Graph implementation of the mailbox operations for a single mailbox,
 * authenticated with an application token from the injected provider.
 */
export class GraphMailboxClient implements MailboxOperations {
  private readonly userId: string
  private readonly tokenProvider: TokenProvider
  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(options: GraphMailboxClientOptions) {
    this.userId = options.userId
    this.tokenProvider = options.tokenProvider
    this.baseUrl = (options.baseUrl ?? 'https://graph.microsoft.com/v1.0').replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 30_000
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const token = await this.tokenProvider.getToken()
    const url = new URL(`${this.baseUrl}/users/${encodeURIComponent(this.userId)}${path}`)
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value))
    }

    let response: Response
    let text: string
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json'
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs)
      })
      text = await response.text()
    } catch (error) {
      throw new RemoteServiceError(`${method} ${path} failed: ${errorMessage(error)}`, {cause: error})
    }

    if (!response.ok) throw graphError(response.status, text)
    // 202 Accepted and 204 No Content carry no body.
    if (!text) return {}

    try {
      return JSON.parse(text)
    } catch (error) {
      throw new RemoteServiceError(`${method} ${path} returned a non-JSON body`, {cause: error})
    }
  }

  private async run<T>(work: () => Promise<T>): Promise<MailboxOperationResult<T>> {
    try {
      return {success: true, payload: await work()}
    } catch (error) {
      if (error instanceof MailboxOperationError) {
        return {success: false, kind: error.kind, error: `${error.kind}: ${error.message}`}
      }
      throw error
    }
  }

  listEmails(params: ListEmailsParams): Promise<MailboxOperationResult<MessageSummary[]>> {
    return this.run(async () => {
      const path = params.folder ? `/mailFolders/${encodeURIComponent(params.folder)}/messages` : '/messages'
      const data = await this.send('GET', path, {
        query: {
          $top: params.top,
          $select: MESSAGE_SELECT,
          $filter: params.filter,
          // Graph rejects $orderby on a property the $filter does not also constrain.
          $orderby: params.filter ? undefined : 'receivedDateTime desc'
        }
      })
      return parseGraph(collection(graphMessageSchema), data, 'message list').value.map(toMessageSummary)
    })
  }

  sendEmail(params: SendEmailParams): Promise<MailboxOperationResult<{status: 'sent'; recipients: number}>> {
    return this.run(async () => {
      await this.send('POST', '/sendMail', {
        body: {
          message: {
            subject: params.subject,
            body: {contentType: params.bodyType, content: params.body},
            toRecipients: toRecipients(params.to),
            ...(params.cc ? {ccRecipients: toRecipients(params.cc)} : {})
          },
          saveToSentItems: params.saveToSentItems
        }
      })
      return {status: 'sent' as const, recipients: params.to.length + (params.cc?.length ?? 0)}
    })
  }

  createDraft(params: CreateDraftParams): Promise<MailboxOperationResult<{draftId: string}>> {
    return this.run(async () => {
      const data = await this.send('POST', '/messages', {
        body: {
          subject: params.subject,
          body: {contentType: params.bodyType, content: params.body},
          toRecipients: toRecipients(params.to),
          ...(params.cc ? {ccRecipients: toRecipients(params.cc)} : {})
        }
      })
      return {draftId: parseGraph(createdResourceSchema, data, 'draft').id}
    })
  }

  updateDraft(params: UpdateDraftParams): Promise<MailboxOperationResult<{draftId: string}>> {
    return this.run(async () => {
      const changes: Record<string, unknown> = {}
      if (params.subject !== undefined) changes.subject = params.subject
      if (params.to !== undefined) changes.toRecipients = toRecipients(params.to)
      if (params.body !== undefined) changes.body = {contentType: params.bodyType ?? 'Text', content: params.body}

      await this.send('PATCH', `/messages/${encodeURIComponent(params.messageId)}`, {body: changes})
      return {draftId: params.messageId}
    })
  }

  sendDraft(params: SendDraftParams): Promise<MailboxOperationResult<{status: 'sent'; draftId: string}>> {
    return this.run(async () => {
      await this.send('POST', `/messages/${encodeURIComponent(params.messageId)}/send`)
      return {status: 'sent' as const, draftId: params.messageId}
    })
  }

  listDrafts(params: ListDraftsParams): Promise<MailboxOperationResult<MessageSummary[]>> {
    return this.run(async () => {
      const data = await this.send('GET', '/mailFolders/drafts/messages', {
        query: {$top: params.top, $select: MESSAGE_SELECT, $orderby: 'lastModifiedDateTime desc'}
      })
      return parseGraph(collection(graphMessageSchema), data, 'draft list').value.map(toMessageSummary)
    })
  }

  listCalendarEvents(params: ListCalendarEventsParams): Promise<MailboxOperationResult<EventSummary[]>> {
    return this.run(async () => {
      const windowed = params.startDateTime !== undefined && params.endDateTime !== undefined
      const data = await this.send('GET', windowed ? '/calendarView' : '/events', {
        query: {
          $top: params.top,
          $select: EVENT_SELECT,
          $orderby: 'start/dateTime',
          startDateTime: params.startDateTime,
          endDateTime: params.endDateTime
        }
      })
      return parseGraph(collection(graphEventSchema), data, 'event list').value.map(toEventSummary)
    })
  }

  createCalendarEvent(
    params: CreateCalendarEventParams
  ): Promise<MailboxOperationResult<{eventId: string; webLink: string | null}>> {
    return this.run(async () => {
      const data = await this.send('POST', '/events', {
        body: {
          subject: params.subject,
          start: {dateTime: params.startDateTime, timeZone: params.timeZone},
          end: {dateTime: params.endDateTime, timeZone: params.timeZone},
          ...(params.body !== undefined ? {body: {contentType: 'Text', content: params.body}} : {}),
          ...(params.location ? {location: {displayName: params.location}} : {}),
          attendees: (params.attendees ?? []).map((address) => ({emailAddress: {address}, type: 'required'}))
        }
      })
      const event = parseGraph(graphEventSchema, data, 'event')
      return {eventId: event.id, webLink: event.webLink ?? null}
    })
  }

  getMailboxSettings(): Promise<MailboxOperationResult<MailboxSettings>> {
    return this.run(async () => {
      const data = await this.send('GET', '/mailboxSettings')
      return withoutODataAnnotations(parseGraph(settingsSchema, data, 'mailbox settings'))
    })
  }

  updateMailboxSettings(params: UpdateMailboxSettingsParams): Promise<MailboxOperationResult<MailboxSettings>> {
    return this.run(async () => {
      const autoReply =
        params.autoReplyStatus !== undefined || params.autoReplyMessage !== undefined
          ? {
              automaticRepliesSetting: {
                ...(params.autoReplyStatus !== undefined ? {status: params.autoReplyStatus} : {}),
                ...(params.autoReplyMessage !== undefined
                  ? {externalReplyMessage: params.autoReplyMessage, internalReplyMessage: params.autoReplyMessage}
                  : {})
              }
            }
          : {}

      const data = await this.send('PATCH', '/mailboxSettings', {
        body: {
          ...(params.timeZone !== undefined ? {timeZone: params.timeZone} : {}),
          ...autoReply
        }
      })
      return withoutODataAnnotations(parseGraph(settingsSchema, data, 'mailbox settings'))
    })
  }

  createForwardingRule(params: CreateForwardingRuleParams): Promise<MailboxOperationResult<{ruleId: string}>> {
    return this.run(async () => {
      const conditions = {
        ...(params.senderContains?.length ? {senderContains: params.senderContains} : {}),
        ...(params.subjectContains?.length ? {subjectContains: params.subjectContains} : {})
      }
      const data = await this.send('POST', '/mailFolders/inbox/messageRules', {
        body: {
          displayName: params.displayName,
          sequence: 1,
          isEnabled: true,
          ...(Object.keys(conditions).length > 0 ? {conditions} : {}),
          actions: {forwardTo: toRecipients(params.forwardTo), stopProcessingRules: false}
        }
      })
      return {ruleId: parseGraph(createdResourceSchema, data, 'message rule').id}
    })
  }
}
