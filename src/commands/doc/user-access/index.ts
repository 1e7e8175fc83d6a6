import { Args, Flags } from '@oclif/core'

import BaseCommand, { accessFlag, docFlag, teamFlag } from '../../../base-command.js'
import { toRole } from '../../../lib/cli-output.js'

export default class DocUserAccess extends BaseCommand {
  static args = {
    user: Args.integer({ description: 'The user id', required: true }),
  }
  static description = 'Change the access level of a user to a document'
  static examples = ['<%= config.bin %> doc user-access 42 -a editors -A viewers']
  static flags = {
    ...BaseCommand.baseFlags,
    access: accessFlag,
    document: docFlag,
    'max-access': Flags.option({
      char: 'A',
      default: 'owners',
      description: 'Highest access inherited from the workspace',
      options: ['owners', 'editors', 'viewers'] as const,
    })(),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocUserAccess)
    const api = await this.connect(flags)

    const users = await api.listDocUsers(flags.document, flags.team)
    this.exitIfError(users)
    const email = this.findUserEmail(users[1], args.user)
    this.printDoneOrExit(
      await api.updateDocUsers({ [email]: toRole(flags.access) }, flags['max-access'], flags.document, flags.team)
    )
  }
}
