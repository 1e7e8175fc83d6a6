import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class AttStore extends BaseCommand {
  static description = 'Show the type of store new attachments go to'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttStore)
    const api = await this.connect(flags)

    const result = await api.seeAttachmentStore(flags.document, flags.team)
    this.exitIfError(result)
    this.printOutput(result[1], result[1])
  }
}
