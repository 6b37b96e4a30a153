import type {MailboxErrorKind} from '../core/errors.js'
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

/** Uniform envelope returned by every mailbox operation. */
export type MailboxOperationResult<T = unknown> =
  | {success: true; payload: T}
  | {success: false; kind: MailboxErrorKind; error: string}

export type MessageSummary = {
  id: string
  subject: string
  from: string
  receivedDateTime: string | null
  isRead: boolean
  preview: string
}

export type EventSummary = {
  id: string
  subject: string
  start: string | null
  end: string | null
  timeZone: string | null
  location: string | null
}

export type MailboxSettings = Record<string, unknown>

export interface MailboxOperations {
  listEmails(params: ListEmailsParams): Promise<MailboxOperationResult<MessageSummary[]>>
  sendEmail(params: SendEmailParams): Promise<MailboxOperationResult<{status: 'sent'; recipients: number}>>
  createDraft(params: CreateDraftParams): Promise<MailboxOperationResult<{draftId: string}>>
  updateDraft(params: UpdateDraftParams): Promise<MailboxOperationResult<{draftId: string}>>
  sendDraft(params: SendDraftParams): Promise<MailboxOperationResult<{status: 'sent'; draftId: string}>>
  listDrafts(params: ListDraftsParams): Promise<MailboxOperationResult<MessageSummary[]>>
  listCalendarEvents(params: ListCalendarEventsParams): Promise<MailboxOperationResult<EventSummary[]>>
  createCalendarEvent(
    params: CreateCalendarEventParams
  ): Promise<MailboxOperationResult<{eventId: string; webLink: string | null}>>
  getMailboxSettings(): Promise<MailboxOperationResult<MailboxSettings>>
  updateMailboxSettings(params: UpdateMailboxSettingsParams): Promise<MailboxOperationResult<MailboxSettings>>
  createForwardingRule(params: CreateForwardingRuleParams): Promise<MailboxOperationResult<{ruleId: string}>>
}
