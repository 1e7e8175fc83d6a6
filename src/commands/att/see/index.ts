import { Args } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class AttSee extends BaseCommand {
  static args = {
    id: Args.integer({ description: 'The attachment id', required: true }),
  }
  static description = 'Show the metadata of an attachment'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(AttSee)
    const api = await this.connect(flags)

    const result = await api.seeAttachment(args.id, flags.document, flags.team)
    this.exitIfError(result)
    const pairs: Array<[string, unknown]> = [['id', args.id], ...Object.entries(result[1])]
    this.printOutput(formatKeyValue(pairs, { styled: this.styled }), result[1])
  }
}
