import { Args, Flags } from '@oclif/core'

import type { GristWebhookFields } from '../../../lib/types.js'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { parseEvents } from '../../../lib/cli-output.js'

export default class HookUpdate extends BaseCommand {
  static args = {
    id: Args.string({ description: 'The webhook id', required: true }),
  }
  static description = 'Modify a webhook; options left out keep their value'
  static examples = ['<%= config.bin %> hook update 4f1c --disabled', '<%= config.bin %> hook update 4f1c --events add --url https://example.com/v2']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    enabled: Flags.boolean({ allowNo: true, description: 'Enable or disable delivery' }),
    events: Flags.string({ description: 'Event types, colon-separated, eg add:update' }),
    name: Flags.string({ description: 'Webhook name' }),
    ready: Flags.string({ description: 'Column that marks a record as ready to be sent' }),
    table: Flags.string({ description: 'Table id' }),
    team: teamFlag,
    url: Flags.string({ description: 'Url the payloads are posted to' }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(HookUpdate)
    const api = await this.connect(flags)

    const fields: GristWebhookFields = {}
    if (flags.name !== undefined) fields.name = flags.name
    if (flags.url !== undefined) fields.url = flags.url
    if (flags.table !== undefined) fields.tableId = flags.table
    if (flags.ready !== undefined) fields.isReadyColumn = flags.ready
    if (flags.enabled !== undefined) fields.enabled = flags.enabled
    if (flags.events !== undefined) fields.eventTypes = parseEvents(flags.events)

    this.printDoneOrExit(await api.updateWebhook(args.id, fields, flags.document, flags.team))
  }
}
