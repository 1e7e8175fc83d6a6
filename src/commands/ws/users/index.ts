import BaseCommand, { teamFlag, workspaceFlag } from '../../../base-command.js'

export default class WsUsers extends BaseCommand {
  static description = 'List users with access to a workspace'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(WsUsers)
    const api = await this.connect(flags)

    const result = await api.listWorkspaceUsers(flags.workspace, flags.team)
    this.exitIfError(result)
    this.printOutput(this.formatUsers(result[1]), result[1])
  }
}
