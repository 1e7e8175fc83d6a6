import BaseCommand, { teamFlag } from '../../../base-command.js'

export default class TeamUsers extends BaseCommand {
  static description = 'List users with access to a team site'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TeamUsers)
    const api = await this.connect(flags)

    const result = await api.listTeamUsers(flags.team)
    this.exitIfError(result)
    this.printOutput(this.formatUsers(result[1]), result[1])
  }
}
