import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class RecList extends BaseCommand {
  static description = 'Fetch the records of a table; use sql for filtering'
  static examples = ['<%= config.bin %> rec list -b People --sort "-age" --limit 10']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    hidden: Flags.boolean({ char: 'H', default: false, description: 'Include hidden columns' }),
    limit: Flags.integer({ char: 'l', default: 0, description: 'Return at most this number of rows', min: 0 }),
    sort: Flags.string({ char: 's', default: '', description: 'Sort order, comma-separated columns, - for descending' }),
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(RecList)
    const api = await this.connect(flags)

    const options = { hidden: flags.hidden, limit: flags.limit, sort: flags.sort }
    const result = await api.listRecords(flags.table, options, flags.document, flags.team)
    this.exitIfError(result)
    const records = result[1]
    if (records.length === 0) {
      this.printOutput('No records found.', records)
      return
    }

    const columns = Object.keys(records[0])
    const rows = records.map(record => columns.map(col => record[col]))
    this.printOutput(formatTable(columns, rows, { styled: this.styled }), records)
  }
}
