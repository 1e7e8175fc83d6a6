import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocCopy extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The name of the copy', required: true }),
  }
  static description = 'Copy a document into a workspace'
  static examples = ['<%= config.bin %> doc copy "Inventory backup" --dest 7', '<%= config.bin %> doc copy Blank --dest 7 --template']
  static flags = {
    ...BaseCommand.baseFlags,
    dest: Flags.integer({ description: 'Destination workspace id', required: true }),
    document: docFlag,
    team: teamFlag,
    template: Flags.boolean({ default: false, description: 'Copy the structure only, no data' }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocCopy)
    const api = await this.connect(flags)

    const result = await api.copyDoc(flags.dest, args.name, flags.template, flags.document, flags.team)
    this.printDoneAndId(result, result[1])
  }
}
