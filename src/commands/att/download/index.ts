import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class AttDownload extends BaseCommand {
  static args = {
    file: Args.string({ description: 'Output file path', required: true }),
  }
  static description = 'Download one attachment as a file'
  static examples = ['<%= config.bin %> att download photo.png -a 12']
  static flags = {
    ...BaseCommand.baseFlags,
    attachment: Flags.integer({ char: 'a', description: 'The attachment id', required: true }),
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(AttDownload)
    const api = await this.connect(flags)
    const target = this.checkDownloadPath(args.file)

    this.forceTextOutput()
    this.printDoneOrExit(await api.downloadAttachment(target, flags.attachment, flags.document, flags.team))
  }
}
