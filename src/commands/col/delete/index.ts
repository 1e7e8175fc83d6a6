import { Args } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'

export default class ColDelete extends BaseCommand {
  static args = {
    column: Args.string({ description: 'Id of the column to delete', required: true }),
  }
  static description = 'Delete a column'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ColDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteColumn(flags.table, args.column, flags.document, flags.team))
  }
}
