import { Args } from '@oclif/core'

import BaseCommand, { teamFlag, workspaceFlag } from '../../../base-command.js'

export default class WsUpdate extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The new name', required: true }),
  }
  static description = 'Rename a workspace'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(WsUpdate)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.updateWorkspace(args.name, flags.workspace, flags.team))
  }
}
