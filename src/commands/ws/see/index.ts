import BaseCommand, { workspaceFlag } from '../../../base-command.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class WsSee extends BaseCommand {
  static description = 'Describe a workspace'
  static examples = ['<%= config.bin %> ws see -w 42']
  static flags = {
    ...BaseCommand.baseFlags,
    workspace: workspaceFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(WsSee)
    const api = await this.connect(flags)

    const result = await api.seeWorkspace(flags.workspace)
    this.exitIfError(result)
    const ws = result[1]
    const pairs: Array<[string, unknown]> = [
      ['id', ws.id],
      ['name', ws.name],
      ['team', ws.org ? `${ws.org.id} - ${ws.org.name}` : 'Null'],
    ]
    for (const doc of ws.docs ?? []) {
      pairs.push(['doc', `${doc.id} - ${doc.name}`])
    }

    this.printOutput(formatKeyValue(pairs, { styled: this.styled }), ws)
  }
}
