import BaseCommand from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class ScimSchemas extends BaseCommand {
  static description = 'Show the SCIM schemas'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(ScimSchemas)
    const api = await this.connect(flags)

    const result = await api.seeScimSchemas()
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
