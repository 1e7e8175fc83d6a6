import { Args, Flags } from '@oclif/core'

import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'

export default class DocUpdate extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The new name, empty to keep the current one', required: true }),
  }
  static description = 'Change the name or the pinned state of a document'
  static examples = [
    '<%= config.bin %> doc update "Inventory 2024"',
    '<%= config.bin %> doc update "" --no-pinned',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    pinned: Flags.boolean({ allowNo: true, char: 'P', description: 'Pin or unpin the document' }),
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(DocUpdate)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.updateDoc(args.name, flags.pinned, flags.document, flags.team))
  }
}
