import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class AttTransfer extends BaseCommand {
  static description = 'Start moving every attachment to the current store'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttTransfer)
    const api = await this.connect(flags)

    const result = await api.transferAttachments(flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
