import { Args, Flags } from '@oclif/core'

import type { ApiResult } from '../../../lib/api/request.js'

import BaseCommand, { docFlag, tableFlag, teamFlag } from '../../../base-command.js'

export default class TableDownload extends BaseCommand {
  static args = {
    file: Args.string({ description: 'Output file path', required: true }),
  }
  static description = 'Dump the content or the schema of a table to a file'
  static examples = [
    '<%= config.bin %> table download people.csv -b People',
    '<%= config.bin %> table download people.json -b People -m schema --header colId',
  ]
  static flags = {
    ...BaseCommand.baseFlags,
    document: docFlag,
    header: Flags.option({
      default: 'label',
      description: 'Column headers',
      options: ['label', 'colId'] as const,
    })(),
    'output-mode': Flags.option({
      char: 'm',
      default: 'csv',
      description: 'Output type',
      options: ['csv', 'excel', 'schema'] as const,
    })(),
    table: tableFlag,
    team: teamFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TableDownload)
    const api = await this.connect(flags)
    const target = this.checkDownloadPath(args.file)

    const { document, header, table, team } = flags
    let result: ApiResult<unknown>
    switch (flags['output-mode']) {
      case 'excel': {
        result = await api.downloadExcel(target, table, header, document, team)
        break
      }

      case 'schema': {
        result = await api.downloadSchema(table, header, target, document, team)
        break
      }

      default: {
        result = await api.downloadCsv(target, table, header, document, team)
      }
    }

    this.forceTextOutput()
    this.printDoneOrExit(result)
  }
}
