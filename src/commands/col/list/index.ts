import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

const SHOWN_FIELDS = ['label', 'type', 'isFormula', 'formula']

export default class ColList extends BaseCommand {
  static description = 'List the columns of a table'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    hidden: Flags.boolean({ char: 'H', default: false, description: 'Include hidden columns' }),
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ColList)
    const api = await this.connect(flags)

    const result = await api.listCols(flags.table, flags.hidden, flags.document, flags.team)
    this.exitIfError(result)
    const rows = result[1].flatMap(col =>
      SHOWN_FIELDS.map((key, i) => [i === 0 ? col.id : '', `${key}: ${String(col.fields[key])}`])
    )
    this.printOutput(formatTable(['column id', 'metadata'], rows, { styled: this.styled }), result[1])
  }
}
