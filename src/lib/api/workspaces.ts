/**
 * Workspaces API module
 */

import type { AccessDelta, GristAccessUser, GristWorkspace, MaxInheritedRole } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi } from './base.js'

export class WorkspacesApi extends BaseApi {
  /**
   * Create a workspace in a team site; returns the new workspace id
   */
  async addWorkspace(name: string, teamId = ''): Promise<ApiResult<number>> {
    return this.caller.call({
      body: { name },
      method: 'POST',
      url: `${this.server(teamId)}/orgs/${this.team(teamId)}/workspaces`,
      write: true,
    })
  }

  async deleteWorkspace(wsId = 0, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      method: 'DELETE',
      url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}`,
      write: true,
    })
  }

  async listWorkspaces(teamId = ''): Promise<ApiResult<GristWorkspace[]>> {
    return this.caller.call({ url: `${this.server(teamId)}/orgs/${this.team(teamId)}/workspaces` })
  }

  async listWorkspaceUsers(wsId = 0, teamId = ''): Promise<ApiResult<GristAccessUser[]>> {
    const result = await this.caller.call({ url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}/access` })
    return this.pluck(result, 'users')
  }

  async seeWorkspace(wsId = 0, teamId = ''): Promise<ApiResult<GristWorkspace>> {
    return this.caller.call({ url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}` })
  }

  async updateWorkspace(newName: string, wsId = 0, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      body: { name: newName },
      method: 'PATCH',
      url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}`,
      write: true,
    })
  }

  async updateWorkspaceUsers(
    users: AccessDelta,
    maxInheritedRole?: MaxInheritedRole,
    wsId = 0,
    teamId = ''
  ): Promise<ApiResult<null>> {
    const delta = maxInheritedRole === undefined ? { users } : { maxInheritedRole, users }
    return this.caller.call({
      body: { delta },
      method: 'PATCH',
      url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}/access`,
      write: true,
    })
  }
}
