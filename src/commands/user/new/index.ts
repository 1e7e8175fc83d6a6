import { Args, Flags } from '@oclif/core'

import BaseCommand from '../../../base-command.js'

export default class UserNew extends BaseCommand {
  /* eslint-disable perfectionist/sort-objects -- positional arg order matters in oclif */
  static args = {
    name: Args.string({ description: 'User name', required: true }),
    email: Args.string({ description: 'User email', required: true }),
  }
  /* eslint-enable perfectionist/sort-objects */
  static description = 'Add a user'
  static examples = ['<%= config.bin %> user new alice alice@example.com -d "Alice B."']
  static flags = {
    ...BaseCommand.baseFlags,
    display: Flags.string({ char: 'd', default: '', description: 'Display name' }),
    formatted: Flags.string({ char: 'f', default: '', description: 'Formatted name' }),
    language: Flags.string({ char: 'g', default: 'en', description: 'Preferred language' }),
    locale: Flags.string({ char: 'l', default: 'en', description: 'Locale' }),
    picture: Flags.string({ char: 'p', default: '', description: 'Picture url' }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(UserNew)
    const api = await this.connect(flags)

    const result = await api.addUser({
      displayName: flags.display || undefined,
      email: args.email,
      formattedName: flags.formatted || undefined,
      locale: flags.locale,
      photos: flags.picture ? [flags.picture] : undefined,
      preferredLanguage: flags.language,
      userName: args.name,
    })
    this.printDoneAndId(result, result[1])
  }
}
