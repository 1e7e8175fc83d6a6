import BaseCommand, { teamFlag } from '../../../base-command.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class TeamSee extends BaseCommand {
  static description = 'Describe a team site'
  static examples = ['<%= config.bin %> team see', '<%= config.bin %> team see -t myteam']
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TeamSee)
    const api = await this.connect(flags)

    const result = await api.seeTeam(flags.team)
    this.exitIfError(result)
    const team = result[1]
    const content = formatKeyValue([
      ['id', team.id],
      ['name', team.name],
      ['domain', team.domain],
      ['owner', team.owner ? `${team.owner.id} - ${team.owner.name}` : 'None'],
    ], { styled: this.styled })
    this.printOutput(content, team)
  }
}
