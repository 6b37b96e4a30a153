import {
  createCalendarEventParams,
  createDraftParams,
  createForwardingRuleParams,
  getMailboxSettingsParams,
  listCalendarEventsParams,
  listDraftsParams,
  listEmailsParams,
  sendDraftParams,
  sendEmailParams,
  updateDraftParams,
  updateMailboxSettingsParams
} from '../mailbox/schemas.js'
import type {MailboxOperations} from '../mailbox/types.js'
import {defineTool, ToolRegistry, type MailboxTool} from './registry.js'

export const mailboxTools: readonly MailboxTool[] = [
  defineTool({
    name: 'listEmails',
    description: 'List recent messages in the mailbox, newest first, optionally filtered with an OData expression.',
    parameters: listEmailsParams,
    handler: (client, args) => client.listEmails(args)
  }),
  defineTool({
    name: 'sendEmail',
    description: 'Send a new email immediately.',
    parameters: sendEmailParams,
    handler: (client, args) => client.sendEmail(args)
  }),
  defineTool({
    name: 'createDraft',
    description: 'Save a new email as a draft without sending it.',
    parameters: createDraftParams,
    handler: (client, args) => client.createDraft(args)
  }),
  defineTool({
    name: 'updateDraft',
    description: 'Change the recipients, subject or body of an existing draft.',
    parameters: updateDraftParams,
    handler: (client, args) => client.updateDraft(args)
  }),
  defineTool({
    name: 'sendDraft',
    description: 'Send an existing draft.',
    parameters: sendDraftParams,
    handler: (client, args) => client.sendDraft(args)
  }),
  defineTool({
    name: 'listDrafts',
    description: 'List drafts, most recently edited first.',
    parameters: listDraftsParams,
    handler: (client, args) => client.listDrafts(args)
  }),
  defineTool({
    name: 'listCalendarEvents',
    description: 'List calendar events, optionally within a start/end window.',
    parameters: listCalendarEventsParams,
    handler: (client, args) => client.listCalendarEvents(args)
  }),
  defineTool({
    name: 'createCalendarEvent',
    description: 'Create a calendar event and invite attendees.',
    parameters: createCalendarEventParams,
    handler: (client, args) => client.createCalendarEvent(args)
  }),
  defineTool({
    name: 'getMailboxSettings',
    description: 'Read mailbox settings such as time zone, language and automatic replies.',
    parameters: getMailboxSettingsParams,
    handler: (client) => client.getMailboxSettings()
  }),
  defineTool({
    name: 'updateMailboxSettings',
    description: 'Change the mailbox time zone or automatic-reply settings.',
    parameters: updateMailboxSettingsParams,
    handler: (client, args) => client.updateMailboxSettings(args)
  }),
  defineTool({
    name: 'createForwardingRule',
    description: 'Create an inbox rule that forwards matching mail to other addresses.',
    parameters: createForwardingRuleParams,
    handler: (client, args) => client.createForwardingRule(args)
  })
]

export function createMailboxToolRegistry(client: MailboxOperations): ToolRegistry {
  return new ToolRegistry(mailboxTools, client)
}
