import BaseCommand, { teamFlag } from '../../../base-command.js'
import { formatTable } from '../../../lib/format.js'

export default class WsList extends BaseCommand {
  static description = 'List workspaces and documents in a team site'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(WsList)
    const api = await this.connect(flags)

    const result = await api.listWorkspaces(flags.team)
    this.exitIfError(result)
    const rows = result[1].map(ws => [
      ws.id,
      ws.name,
      ws.owner ? ws.owner.id : 'Null',
      ws.owner?.email ?? '',
      ws.docs?.length ?? 0,
    ])
    this.printOutput(formatTable(['id', 'name', 'owner', 'email', 'docs'], rows, { styled: this.styled }), result[1])
  }
}
