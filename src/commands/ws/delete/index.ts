import BaseCommand, { teamFlag, workspaceFlag } from '../../../base-command.js'

export default class WsDelete extends BaseCommand {
  static description = 'Delete a workspace and its documents'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(WsDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteWorkspace(flags.workspace, flags.team))
  }
}
