import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocDelete extends BaseCommand {
  static description = 'Delete a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(DocDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteDoc(flags.document, flags.team))
  }
}
