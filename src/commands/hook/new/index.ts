import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { parseEvents } from '../../../lib/cli-output.js'

export default class HookNew extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Webhook name', required: true }),
    url: Args.string({ description: 'Url the payloads are posted to', required: true }),
  }
  static description = 'Add a webhook to a document'
  static examples = ['<%= config.bin %> hook new notify https://example.com/hook -b People --events add:update']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    enabled: Flags.boolean({ allowNo: true, default: true, description: 'Deliver payloads right away' }),
    events: Flags.string({ default: 'add', description: 'Event types, colon-separated, eg add:update' }),
    ready: Flags.string({ description: 'Column that marks a record as ready to be sent' }),
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(HookNew)
    const api = await this.connect(flags)

    const result = await api.addWebhooks([{
      enabled: flags.enabled,
      eventTypes: parseEvents(flags.events),
      isReadyColumn: flags.ready ?? null,
      memo: '',
      name: args.name,
      tableId: flags.table,
      url: args.url,
    }], flags.document, flags.team)
    this.printDoneAndId(result, result[1][0])
  }
}
