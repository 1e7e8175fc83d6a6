import { Args, Flags } from '@oclif/core'

import BaseCommand, { teamFlag, workspaceFlag } from '../../../base-command.js'

export default class DocNew extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The name of the new document', required: true }),
  }
  static description = 'Create an empty document'
  static examples = ['<%= config.bin %> doc new Inventory --pinned -w 7']
  static flags = {
    ...BaseCommand.baseFlags,
    pinned: Flags.boolean({ char: 'P', default: false, description: 'Pin the document' }),
    team: teamFlag,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocNew)
    const api = await this.connect(flags)

    const result = await api.addDoc(args.name, flags.pinned, flags.workspace, flags.team)
    this.printDoneAndId(result, result[1])
  }
}
