import { Args } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatYaml } from '../../../lib/format.js'

export default class AttRestore extends BaseCommand {
  static args = {
    file: Args.string({ description: 'Archive made by att backup', required: true }),
  }
  static description = 'Upload missing attachments from a tar archive'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(AttRestore)
    const api = await this.connect(flags)
    const source = this.checkUploadPath(args.file)

    const result = await api.uploadRestoreAttachments(source, flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(formatYaml(result[1]), result[1])
  }
}
