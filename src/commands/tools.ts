import {Command, Flags} from '@oclif/core'
import {mailboxTools} from '../tools/mailbox-tools.js'
import {ToolRegistry} from '../tools/registry.js'
import type {MailboxOperations} from '../mailbox/types.js'

function unavailable(): never {
  throw new Error('tool listing does not call the mailbox')
}

// Definitions never touch the client, so listing works without credentials.
const offlineMailbox: MailboxOperations = {
  listEmails: unavailable,
  sendEmail: unavailable,
  createDraft: unavailable,
  updateDraft: unavailable,
  sendDraft: unavailable,
  listDrafts: unavailable,
  listCalendarEvents: unavailable,
  createCalendarEvent: unavailable,
  getMailboxSettings: unavailable,
  updateMailboxSettings: unavailable,
  createForwardingRule: unavailable
}

export default class Tools extends Command {
  static override description = 'List the mailbox tools offered to the model'

  static override flags = {
    json: Flags.boolean({description: 'print the definitions with their JSON schemas'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Tools)
    const definitions = new ToolRegistry(mailboxTools, offlineMailbox).listDefinitions()

    if (flags.json) {
      this.log(JSON.stringify(definitions, null, 2))
      return
    }

    for (const definition of definitions) {
      this.log(definition.name)
      this.log(`  ${definition.description}`)
    }
  }
}
