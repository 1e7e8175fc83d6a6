import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocPurgeHistory extends BaseCommand {
  static description = 'Delete the action history of a document'
  static examples = ['<%= config.bin %> doc purge-history --keep 10']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    keep: Flags.integer({ char: 'k', default: 0, description: 'Latest actions to keep', min: 0 }),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(DocPurgeHistory)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteDocHistory(flags.keep, flags.document, flags.team))
  }
}
