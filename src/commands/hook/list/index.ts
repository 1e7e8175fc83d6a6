import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class HookList extends BaseCommand {
  static description = 'List the webhooks of a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(HookList)
    const api = await this.connect(flags)

    const result = await api.listWebhooks(flags.document, flags.team)
    this.exitIfError(result)
    const hooks = result[1]
    if (hooks.length === 0) {
      this.printOutput('No webhooks.', hooks)
      return
    }

    const rows = hooks.map(({ fields, id }) => [
      id,
      fields.name,
      fields.url,
      fields.enabled,
      fields.tableId,
      (fields.eventTypes ?? []).join(', '),
    ])
    const columns = ['id', 'name', 'url', 'enabled', 'table', 'events']
    this.printOutput(formatTable(columns, rows, { styled: this.styled }), hooks)
  }
}
