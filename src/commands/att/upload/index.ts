import { Args } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class AttUpload extends BaseCommand {
  static args = {
    files: Args.string({ description: 'Files to upload', required: true }),
  }
  static description = 'Upload one or more attachments to a document'
  static examples = ['<%= config.bin %> att upload photo.png report.pdf']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }
  static strict = false

  async run(): Promise<void> {
    const { argv, flags } = await this.parse(AttUpload)
    const api = await this.connect(flags)

    const files = argv.map(file => this.checkUploadPath(String(file)))
    const result = await api.uploadAttachments(files, flags.document, flags.team)
    this.printDoneAndId(result, result[1])
  }
}
