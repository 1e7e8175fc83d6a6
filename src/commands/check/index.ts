import type { ApiResult } from '../../lib/api/request.js'

import BaseCommand from '../../base-command.js'
import { isSuccess } from '../../lib/api/request.js'
import { TransportError } from '../../lib/errors.js'
import { formatTable } from '../../lib/format.js'

type CheckName = 'connection' | 'default doc' | 'default team' | 'default ws' | 'scim enabled' | 'store type'

function outcome([status, payload]: ApiResult<unknown>, success = 'ok'): string {
  if (isSuccess(status)) return success
  return typeof payload === 'string' ? payload : JSON.stringify(payload)
}

export default class Check extends BaseCommand {
  static description = 'Run a quick test of the current configuration'
  static examples = ['<%= config.bin %> check']
  static flags = {
    ...BaseCommand.baseFlags,
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Check)
    const api = await this.connect(flags)

    const checks: Record<CheckName, string> = {
      connection: 'skipped',
      'scim enabled': 'skipped',
      'default ws': 'skipped',
      'default team': 'skipped',
      'default doc': 'skipped',
      'store type': 'skipped',
    }

    let team: ApiResult<unknown> | undefined
    try {
      team = await api.seeTeam()
    } catch (error) {
      if (!(error instanceof TransportError)) throw error
      checks.connection = error.message
    }

    // a rejected key makes every other check meaningless
    if (team && team[0] === 401) {
      checks.connection = outcome(team)
    } else if (team) {
      checks.connection = 'ok'
      checks['default team'] = outcome(team)
      checks['scim enabled'] = outcome(await api.seeMyself(), 'yes')
      checks['default ws'] = outcome(await api.seeWorkspace())
      if (checks['default team'] === 'ok') {
        checks['default doc'] = outcome(await api.seeDoc())
      }

      if (checks['default doc'] === 'ok') {
        const [status, store] = await api.seeAttachmentStore()
        checks['store type'] = outcome([status, store], String(store))
      }
    }

    this.forceTextOutput()
    this.printOutput(formatTable(['test', 'result'], Object.entries(checks), { styled: this.styled }), checks)
  }
}
