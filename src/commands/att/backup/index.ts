import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class AttBackup extends BaseCommand {
  static args = {
    file: Args.string({ description: 'Output file path', required: true }),
  }
  static description = 'Download all attachments as an archive'
  static examples = ['<%= config.bin %> att backup attachments.tar', '<%= config.bin %> att backup attachments.zip -m zip']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    'output-mode': Flags.option({
      char: 'm',
      default: 'tar',
      description: 'Archive format',
      options: ['tar', 'zip'] as const,
    })(),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(AttBackup)
    const api = await this.connect(flags)
    const target = this.checkDownloadPath(args.file)

    this.forceTextOutput()
    this.printDoneOrExit(await api.downloadAttachments(target, flags['output-mode'], flags.document, flags.team))
  }
}
