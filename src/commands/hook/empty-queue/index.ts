import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class HookEmptyQueue extends BaseCommand {
  static description = 'Drop the payloads waiting to be delivered'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(HookEmptyQueue)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.emptyPayloadsQueue(flags.document, flags.team))
  }
}
