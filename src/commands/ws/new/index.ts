import { Args } from '@oclif/core'

import BaseCommand, { teamFlag } from '../../../base-command.js'

export default class WsNew extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The name of the new workspace', required: true }),
  }
  static description = 'Create an empty workspace'
  static examples = ['<%= config.bin %> ws new Projects']
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(WsNew)
    const api = await this.connect(flags)

    const result = await api.addWorkspace(args.name, flags.team)
    this.printDoneAndId(result, result[1])
  }
}
