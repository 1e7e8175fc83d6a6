import { Args } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class HookDelete extends BaseCommand {
  static args = {
    id: Args.string({ description: 'The webhook id', required: true }),
  }
  static description = 'Delete a webhook'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(HookDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteWebhook(args.id, flags.document, flags.team))
  }
}
