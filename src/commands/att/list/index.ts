import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class AttList extends BaseCommand {
  static description = 'List the metadata of the attachments in a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    limit: Flags.integer({ char: 'l', default: 0, description: 'Return at most this number of rows', min: 0 }),
    sort: Flags.string({ char: 's', default: '', description: 'Sort order, comma-separated fields, - for descending' }),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttList)
    const api = await this.connect(flags)

    const result = await api.listAttachments({ limit: flags.limit, sort: flags.sort }, flags.document, flags.team)
    this.exitIfError(result)
    const rows = result[1].flatMap(att =>
      Object.entries(att.fields).map(([key, value], i) => [i === 0 ? att.id : '', `${key}: ${String(value)}`])
    )
    this.printOutput(formatTable(['att. id', 'metadata'], rows, { styled: this.styled }), result[1])
  }
}
