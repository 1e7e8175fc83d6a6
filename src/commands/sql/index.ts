import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../base-command.js'
import { formatTable } from '../../lib/format.js'

export default class Sql extends BaseCommand {
  static args = {
    statement: Args.string({ description: 'The SQL statement, SELECT only', required: true }),
  }
  static description = 'Run a SELECT query against a document'
  static examples = [
    '<%= config.bin %> sql "select * from People"',
    '<%= config.bin %> sql "select * from People where age > ? and age < ?" -p 18 -p 65',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    param: Flags.string({ char: 'p', description: 'Query parameter, repeat for more', multiple: true }),
    team: teamFlag,
    timeout: Flags.integer({ default: 1000, description: 'Query timeout in milliseconds', min: 1 }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Sql)
    const api = await this.connect(flags)

    const result = flags.param && flags.param.length > 0
      ? await api.runSqlWithArgs(args.statement, flags.param, flags.timeout, flags.document, flags.team)
      : await api.runSql(args.statement, flags.document, flags.team)
    this.exitIfError(result)
    const rows = result[1]
    if (rows.length === 0) {
      this.printOutput('No records found.', rows)
      return
    }

    const columns = Object.keys(rows[0])
    this.printOutput(formatTable(columns, rows.map(row => columns.map(col => row[col])), { styled: this.styled }), rows)
  }
}
