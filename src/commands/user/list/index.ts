import { Flags } from '@oclif/core'

import BaseCommand from '../../../base-command.js'
import { scimUserPairs } from '../../../lib/cli-output.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class UserList extends BaseCommand {
  static description = 'List users, one page at a time'
  static examples = ['<%= config.bin %> user list', '<%= config.bin %> user list --start 11 --retrieve 10']
  static flags = {
    ...BaseCommand.baseFlags,
    retrieve: Flags.integer({ char: 'r', default: 10, description: 'Max users to retrieve', min: 1 }),
    start: Flags.integer({ char: 's', default: 1, description: 'Position of the first user to retrieve', min: 1 }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(UserList)
    const api = await this.connect(flags)

    const result = await api.listUsersRaw(flags.start, flags.retrieve)
    this.exitIfError(result)
    const page = result[1]
    const content = flags.start > page.totalResults
      ? 'No users.'
      : page.Resources.map(user => formatKeyValue(scimUserPairs(user), { styled: this.styled })).join('\n\n')
    this.printOutput(content, page)
  }
}
