import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocDownload extends BaseCommand {
  static args = {
    file: Args.string({ description: 'Output file path', required: true }),
  }
  static description = 'Download a document as a SQLite file'
  static examples = ['<%= config.bin %> doc download backup.grist --history']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    history: Flags.boolean({ char: 'H', default: false, description: 'Include the action history' }),
    team: teamFlag,
    template: Flags.boolean({ default: false, description: 'Structure only, no data' }),
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocDownload)
    const api = await this.connect(flags)
    const target = this.checkDownloadPath(args.file)

    this.forceTextOutput()
    this.printDoneOrExit(await api.downloadSqlite(target, !flags.history, flags.template, flags.document, flags.team))
  }
}
