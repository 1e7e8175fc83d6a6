import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocReload extends BaseCommand {
  static description = 'Reload a document on the server'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(DocReload)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.reloadDoc(flags.document, flags.team))
  }
}
