import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { parseFieldPairs } from '../../../lib/cli-output.js'

export default class RecNew extends BaseCommand {
  static args = {
    fields: Args.string({ description: 'One record, declared as col:value col:value ...', required: true }),
  }
  static description = 'Add one record to a table'
  static examples = ['<%= config.bin %> rec new name:Alice age:30 -b People']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    noparse: Flags.boolean({ default: false, description: 'Store values as given, without parsing by column type' }),
    table: tableFlag,
    team: teamFlag,
  }
  static strict = false

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(RecNew)
    const api = await this.connect(flags)

    const fields = parseFieldPairs(argv.map(String))
    const result = await api.addRecords(flags.table, [fields], flags.noparse, flags.document, flags.team)
    this.exitIfError(result)
    this.printDoneAndId(result, result[1][0])
  }
}
