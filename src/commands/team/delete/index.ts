import { Args } from '@oclif/core'

import BaseCommand, { teamFlag } from '../../../base-command.js'

export default class TeamDelete extends BaseCommand {
  static args = {
    name: Args.string({ description: 'Current name of the team site, as a confirmation', required: true }),
  }
  static description = 'Delete a team site and everything in it'
  static flags = {
    ...BaseCommand.baseFlags,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TeamDelete)
    const api = await this.connect(flags)
    this.printDoneOrExit(await api.deleteTeam(args.name, flags.team))
  }
}
