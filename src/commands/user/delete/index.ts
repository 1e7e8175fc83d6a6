import { Args } from '@oclif/core'

import BaseCommand from '../../../base-command.js'

export default class UserDelete extends BaseCommand {
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
  }
  static description = 'Remove a user'
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(UserDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteUser(String(args.user)))
  }
}
