/**
 * Team sites API module
 */

import type { AccessDelta, GristAccessUser, GristTeam } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi } from './base.js'

export class TeamsApi extends BaseApi {
  /**
   * The service asks for the team name as a confirmation
   */
  async deleteTeam(name: string, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      method: 'DELETE',
      url: `${this.server(teamId)}/orgs/${this.team(teamId)}/${encodeURIComponent(name)}`,
      write: true,
    })
  }

  async listTeamSites(): Promise<ApiResult<GristTeam[]>> {
    return this.caller.call({ url: `${this.server()}/orgs` })
  }

  async listTeamUsers(teamId = ''): Promise<ApiResult<GristAccessUser[]>> {
    const result = await this.caller.call({ url: `${this.server(teamId)}/orgs/${this.team(teamId)}/access` })
    return this.pluck(result, 'users')
  }

  async seeTeam(teamId = ''): Promise<ApiResult<GristTeam>> {
    return this.caller.call({ url: `${this.server(teamId)}/orgs/${this.team(teamId)}` })
  }

  async seeTeamUsage(teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    return this.caller.call({ url: `${this.server(teamId)}/orgs/${this.team(teamId)}/usage` })
  }

  async updateTeam(newName: string, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      body: { name: newName },
      method: 'PATCH',
      url: `${this.server(teamId)}/orgs/${this.team(teamId)}`,
      write: true,
    })
  }

  async updateTeamUsers(users: AccessDelta, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      body: { delta: { users } },
      method: 'PATCH',
      url: `${this.server(teamId)}/orgs/${this.team(teamId)}/access`,
      write: true,
    })
  }
}
