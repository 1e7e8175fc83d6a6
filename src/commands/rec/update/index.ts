import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { parseRecordUpdate } from '../../../lib/cli-output.js'

export default class RecUpdate extends BaseCommand {
  static args = {
    fields: Args.string({ description: 'One record, declared as id:N col:value ...', required: true }),
  }
  static description = 'Modify one record of a table'
  static examples = ['<%= config.bin %> rec update id:3 age:31 -b People']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    noparse: Flags.boolean({ default: false, description: 'Store values as given, without parsing by column type' }),
    table: tableFlag,
    team: teamFlag,
  }
  static strict = false

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(RecUpdate)
    const api = await this.connect(flags)

    const { fields, id } = parseRecordUpdate(argv.map(String))
    this.printDoneOrExit(
      await api.updateRecords(flags.table, [{ ...fields, id }], flags.noparse, flags.document, flags.team)
    )
  }
}
