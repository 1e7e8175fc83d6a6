import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { parseTableOptions, TABLE_OPTIONS } from '../../../lib/cli-output.js'

export default class TableUpdate extends BaseCommand {
  static description = 'Update table metadata'
  static examples = ['<%= config.bin %> table update -b People -o onDemand=false -o primaryViewId=2']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    option: Flags.string({
      char: 'o',
      description: `Metadata field as key=value, one of: ${TABLE_OPTIONS.join(', ')}`,
      multiple: true,
      required: true,
    }),
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TableUpdate)
    const api = await this.connect(flags)

    const fields = parseTableOptions(flags.option)
    this.printDoneOrExit(await api.updateTables([{ fields, id: flags.table }], flags.document, flags.team))
  }
}
