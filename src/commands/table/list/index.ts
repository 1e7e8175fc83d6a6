import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class TableList extends BaseCommand {
  static description = 'List the tables of a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TableList)
    const api = await this.connect(flags)

    const result = await api.listTables(flags.document, flags.team)
    this.exitIfError(result)
    const rows = result[1].flatMap(table =>
      Object.entries(table.fields).map(([key, value], i) => [i === 0 ? table.id : '', `${key}: ${value}`])
    )
    this.printOutput(formatTable(['table id', 'metadata'], rows, { styled: this.styled }), result[1])
  }
}
