import BaseCommand from '../../../base-command.js'
import { scimUserPairs } from '../../../lib/cli-output.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class UserMe extends BaseCommand {
  static description = 'Show the user the API key belongs to'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(UserMe)
    const api = await this.connect(flags)

    const result = await api.seeMyself()
    this.exitIfError(result)
    this.printOutput(formatKeyValue(scimUserPairs(result[1]), { styled: this.styled }), result[1])
  }
}
