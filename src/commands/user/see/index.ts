import { Args } from '@oclif/core'

import BaseCommand from '../../../base-command.js'
import { scimUserPairs } from '../../../lib/cli-output.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class UserSee extends BaseCommand {
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
  }
  static description = 'Show a user'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(UserSee)
    const api = await this.connect(flags)

    const result = await api.seeUser(String(args.user))
    this.exitIfError(result)
    this.printOutput(formatKeyValue(scimUserPairs(result[1]), { styled: this.styled }), result[1])
  }
}
