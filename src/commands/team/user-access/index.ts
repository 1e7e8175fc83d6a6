import { Args } from '@oclif/core'

import BaseCommand, { accessFlag, teamFlag } from '../../../base-command.js'
import { toRole } from '../../../lib/cli-output.js'

export default class TeamUserAccess extends BaseCommand {
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
  }
  static description = 'Change the access level of a user to a team site'
  static examples = ['<%= config.bin %> team user-access 42 -a editors']
  static flags = {
    ...BaseCommand.baseFlags,
    access: accessFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TeamUserAccess)
    const api = await this.connect(flags)

    const users = await api.listTeamUsers(flags.team)
    this.exitIfError(users)
    const email = this.findUserEmail(users[1], args.user)
    this.printDoneOrExit(await api.updateTeamUsers({ [email]: toRole(flags.access) }, flags.team))
  }
}
