import BaseCommand, { teamFlag } from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class TeamUsage extends BaseCommand {
  static description = 'Show the usage summary of a team site'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TeamUsage)
    const api = await this.connect(flags)

    const result = await api.seeTeamUsage(flags.team)
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
