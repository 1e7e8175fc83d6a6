import BaseCommand from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class ScimConfig extends BaseCommand {
  static description = 'Show the SCIM service provider configuration'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ScimConfig)
    const api = await this.connect(flags)

    const result = await api.seeScimConfig()
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
