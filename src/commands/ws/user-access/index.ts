import { Args } from '@oclif/core'

import BaseCommand, { accessFlag, teamFlag, workspaceFlag } from '../../../base-command.js'
import { toRole } from '../../../lib/cli-output.js'

export default class WsUserAccess extends BaseCommand {
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
  }
  static description = 'Change the access level of a user to a workspace'
  static examples = ['<%= config.bin %> ws user-access 42 -a viewers -w 7']
  static flags = {
    ...BaseCommand.baseFlags,
    access: accessFlag,
    team: teamFlag,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(WsUserAccess)
    const api = await this.connect(flags)

    const users = await api.listWorkspaceUsers(flags.workspace, flags.team)
    this.exitIfError(users)
    const email = this.findUserEmail(users[1], args.user)
    this.printDoneOrExit(
      await api.updateWorkspaceUsers({ [email]: toRole(flags.access) }, undefined, flags.workspace, flags.team)
    )
  }
}
