import { Args } from '@oclif/core'

import BaseCommand, { teamFlag } from '../../../base-command.js'

export default class TeamUpdate extends BaseCommand {
  static args = {
    name: Args.string({ description: 'The new name', required: true }),
  }
  static description = 'Rename a team site'
  static examples = ['<%= config.bin %> team update "Sales team"']
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TeamUpdate)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.updateTeam(args.name, flags.team))
  }
}
