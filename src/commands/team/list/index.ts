import BaseCommand from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class TeamList extends BaseCommand {
  static description = 'List the team sites you have access to'
  static examples = ['<%= config.bin %> team list']
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(TeamList)
    const api = await this.connect(flags)

    const result = await api.listTeamSites()
    this.exitIfError(result)
    const rows = result[1].map(team => [team.id, team.name, team.owner?.name ?? 'Null'])
    this.printOutput(formatTable(['id', 'name', 'owner'], rows, { styled: this.styled }), result[1])
  }
}
