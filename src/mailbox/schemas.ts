import {z} from 'zod'

// Parameter schemas shared by the tool registry (validation + model-facing JSON schema)
// and the mailbox client signatures.

const emailAddress = z.string().trim().email()
const recipients = z.array(emailAddress).min(1)
const bodyType = z.enum(['Text', 'HTML'])
const pageSize = z.number().int().min(1).max(50).default(10).describe('Number of items to return (1-50).')
const resourceId = z.string().trim().min(1)
const localDateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/, 'Expected a local date-time such as 2025-03-14T09:30:00')

export const listEmailsParams = z.object({
  top: pageSize,
  filter: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('OData $filter expression, for example "isRead eq false".'),
  folder: z.string().trim().min(1).optional().describe('Well-known folder name (inbox, archive, sentitems) or folder id.')
})

export const sendEmailParams = z.object({
  to: recipients.describe('Recipient email addresses.'),
  cc: z.array(emailAddress).optional(),
  subject: z.string().min(1),
  body: z.string(),
  bodyType: bodyType.default('Text'),
  saveToSentItems: z.boolean().default(true)
})

export const createDraftParams = z.object({
  to: recipients.describe('Recipient email addresses.'),
  cc: z.array(emailAddress).optional(),
  subject: z.string().min(1),
  body: z.string(),
  bodyType: bodyType.default('Text')
})

export const updateDraftParams = z
  .object({
    messageId: resourceId.describe('Id of the draft to update.'),
    to: recipients.optional(),
    subject: z.string().min(1).optional(),
    body: z.string().optional(),
    bodyType: bodyType.optional()
  })
  .refine((params) => params.to !== undefined || params.subject !== undefined || params.body !== undefined, {
    message: 'Provide at least one of to, subject or body to change.'
  })

export const sendDraftParams = z.object({
  messageId: resourceId.describe('Id of the draft to send.')
})

export const listDraftsParams = z.object({
  top: pageSize
})

export const listCalendarEventsParams = z
  .object({
    top: pageSize,
    startDateTime: localDateTime.optional().describe('Window start; requires endDateTime.'),
    endDateTime: localDateTime.optional().describe('Window end; requires startDateTime.')
  })
  .refine((params) => (params.startDateTime === undefined) === (params.endDateTime === undefined), {
    message: 'startDateTime and endDateTime must be given together.'
  })

export const createCalendarEventParams = z.object({
  subject: z.string().min(1),
  startDateTime: localDateTime,
  endDateTime: localDateTime,
  timeZone: z.string().min(1).default('UTC').describe('Windows or IANA time zone name for start and end.'),
  body: z.string().optional(),
  location: z.string().optional(),
  attendees: z.array(emailAddress).optional()
})

export const getMailboxSettingsParams = z.object({})

export const updateMailboxSettingsParams = z
  .object({
    timeZone: z.string().min(1).optional(),
    autoReplyStatus: z.enum(['disabled', 'alwaysEnabled', 'scheduled']).optional(),
    autoReplyMessage: z.string().optional()
  })
  .refine(
    (params) =>
      params.timeZone !== undefined || params.autoReplyStatus !== undefined || params.autoReplyMessage !== undefined,
    {message: 'Provide at least one setting to change.'}
  )

export const createForwardingRuleParams = z.object({
  forwardTo: recipients.describe('Addresses that matching mail is forwarded to.'),
  senderContains: z.array(z.string().min(1)).optional(),
  subjectContains: z.array(z.string().min(1)).optional(),
  displayName: z.string().min(1).default('Forwarding rule')
})

export type ListEmailsParams = z.output<typeof listEmailsParams>
export type SendEmailParams = z.output<typeof sendEmailParams>
export type CreateDraftParams = z.output<typeof createDraftParams>
export type UpdateDraftParams = z.output<typeof updateDraftParams>
export type SendDraftParams = z.output<typeof sendDraftParams>
export type ListDraftsParams = z.output<typeof listDraftsParams>
export type ListCalendarEventsParams = z.output<typeof listCalendarEventsParams>
export type CreateCalendarEventParams = z.output<typeof createCalendarEventParams>
export type UpdateMailboxSettingsParams = z.output<typeof updateMailboxSettingsParams>
export type CreateForwardingRuleParams = z.output<typeof createForwardingRuleParams>
