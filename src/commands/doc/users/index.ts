import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocUsers extends BaseCommand {
  static description = 'List users with access to a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(DocUsers)
    const api = await this.connect(flags)

    const result = await api.listDocUsers(flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(this.formatUsers(result[1]), result[1])
  }
}
