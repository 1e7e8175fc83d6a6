import { Args } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { parseColumnSpecs } from '../../../lib/cli-output.js'

export default class ColUpdate extends BaseCommand {
  static args = {
    columns: Args.string({ description: 'Columns, each declared as id:type:label', required: true }),
  }
  static description = 'Update columns of a table'
  static examples = ['<%= config.bin %> col update name:Text:Name age:Int:Age -b People']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    table: tableFlag,
    team: teamFlag,
  }
  static strict = false

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(ColUpdate)
    const api = await this.connect(flags)

    const columns = parseColumnSpecs(argv.map(String))
    this.printDoneOrExit(await api.updateCols(flags.table, columns, flags.document, flags.team))
  }
}
