import { Args } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { InvocationError } from '../../../lib/cli-output.js'

export default class RecDelete extends BaseCommand {
  static args = {
    ids: Args.string({ description: 'Ids of the records to delete', required: true }),
  }
  static description = 'Delete records from a table'
  static examples = ['<%= config.bin %> rec delete 3 4 5 -b People']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    table: tableFlag,
    team: teamFlag,
  }
  static strict = false

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(RecDelete)
    const api = await this.connect(flags)

    const ids = argv.map(String)
    if (!ids.every(id => /^\d+$/.test(id))) {
      throw new InvocationError('Record ids must be numbers')
    }

    this.printDoneOrExit(await api.deleteRows(flags.table, ids.map(Number), flags.document, flags.team))
  }
}
