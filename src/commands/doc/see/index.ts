import BaseCommand, { docFlag, teamFlag } from '../../../base-command.js'
import { formatKeyValue } from '../../../lib/format.js'

export default class DocSee extends BaseCommand {
  static description = 'Describe a document'
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(DocSee)
    const api = await this.connect(flags)

    const result = await api.seeDoc(flags.document, flags.team)
    this.exitIfError(result)
    const doc = result[1]
    const { workspace } = doc
    const content = formatKeyValue([
      ['id', doc.id],
      ['name', doc.name],
      ['pinned', doc.isPinned],
      ['workspace', workspace ? `${workspace.id} - ${workspace.name}` : 'Null'],
      ['team', workspace?.org ? `${workspace.org.id} - ${workspace.org.name}` : 'Null'],
    ], { styled: this.styled })
    this.printOutput(content, doc)
  }
}
