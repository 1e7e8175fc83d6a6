import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class AttTransferStatus extends BaseCommand {
  static description = 'Show the progress of an attachment transfer'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttTransferStatus)
    const api = await this.connect(flags)

    const result = await api.seeTransferStatus(flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
