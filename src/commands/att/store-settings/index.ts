import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class AttStoreSettings extends BaseCommand {
  static description = 'List the attachment stores available to a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttStoreSettings)
    const api = await this.connect(flags)

    const result = await api.listStoreSettings(flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
