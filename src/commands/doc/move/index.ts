import { Args } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocMove extends BaseCommand {
  static args = {
    dest: Args.integer({ description: 'Destination workspace id', required: true }),
  }
  static description = 'Move a document to another workspace'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocMove)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.moveDoc(args.dest, flags.document, flags.team))
  }
}
