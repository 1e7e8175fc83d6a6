import { Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class AttSetStore extends BaseCommand {
  static description = 'Set the type of store new attachments go to'
  static examples = ['<%= config.bin %> att set-store --external', '<%= config.bin %> att set-store --internal']
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    external: Flags.boolean({ char: 'e', default: false, description: 'Use the external store', exclusive: ['internal'] }),
    internal: Flags.boolean({ default: false, description: 'Use the document itself (default)', exclusive: ['external'] }),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(AttSetStore)
    const api = await this.connect(flags)

    const type = flags.external ? 'external' : 'internal'
    this.printDoneOrExit(await api.updateAttachmentStore(type, flags.document, flags.team))
  }
}
