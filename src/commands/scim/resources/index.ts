import BaseCommand from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class ScimResources extends BaseCommand {
  static description = 'Show the SCIM resource types'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ScimResources)
    const api = await this.connect(flags)

    const result = await api.seeScimResources()
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
