import { Args, Flags } from '@oclif/core'

import BaseCommand from '../../../base-command.js'

export default class UserUpdate extends BaseCommand {
  /* eslint-disable perfectionist/sort-objects -- positional arg order matters in oclif */
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
    path: Args.string({ description: 'Attribute path, eg displayName', required: true }),
    value: Args.string({ description: 'Operation value', required: true }),
  }
  /* eslint-enable perfectionist/sort-objects */
  static description = 'Update a user with a single operation'
  static examples = ['<%= config.bin %> user update 42 displayName "Alice C."']
  static flags = {
    ...BaseCommand.baseFlags,
    operation: Flags.option({
      char: 'o',
      default: 'replace',
      description: 'Operation to perform',
      options: ['add', 'replace', 'remove'] as const,
    })(),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(UserUpdate)
    const api = await this.connect(flags)

    const operation = { op: flags.operation, path: args.path, value: args.value }
    this.printDoneOrExit(await api.updateUser(String(args.user), [operation]))
  }
}
