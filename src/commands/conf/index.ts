import { Flags } from '@oclif/core'

import BaseCommand from '../../base-command.js'
import { CliConfigurator } from '../../lib/cli-config.js'
import { maskApiKey } from '../../lib/config.js'
import { formatKeyValue } from '../../lib/format.js'
import { logger, resolveVerbosity } from '../../lib/logger.js'

export default class Conf extends BaseCommand {
  static description = 'Print the configuration in effect in this directory'
  static examples = ['<%= config.bin %> conf', '<%= config.bin %> conf --show-apikey']
  static flags = {
    ...BaseCommand.baseFlags,
    'show-apikey': Flags.boolean({ char: 'K', default: false, description: 'Show the API key in full' }),
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Conf)
    logger.setLevel(resolveVerbosity(flags['log-level']))
    if (flags.quiet) return

    const config = new CliConfigurator().resolve()
    if (!flags['show-apikey']) {
      config.GRIST_API_KEY = maskApiKey(config.GRIST_API_KEY)
    }

    this.log(flags.verbose > 0 ? JSON.stringify(config, null, 2) : formatKeyValue(Object.entries(config), { styled: this.styled }))
  }
}
