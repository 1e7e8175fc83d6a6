/**
 * Users API module (SCIM)
 */

import type { ScimListResponse, ScimUser } from '../types.js'
import type { PageData } from './pager.js'
import type { ApiResult } from './request.js'

import { BaseApi, isRecord } from './base.js'
import { Pager } from './pager.js'

const SCIM_USER_SCHEMA = 'urn:ietf:params:scim:schemas:core:2.0:User'
const SCIM_SEARCH_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:SearchRequest'
const SCIM_PATCH_SCHEMA = 'urn:ietf:params:scim:api:messages:2.0:PatchOp'

export interface NewScimUser {
  displayName?: string
  email: string
  formattedName?: string
  locale?: string
  photos?: string[]
  preferredLanguage?: string
  userName: string
}

export interface ScimOperation {
  op: 'add' | 'remove' | 'replace'
  path?: string
  value?: unknown
}

export interface UserSearch {
  filter: string
  sortBy?: string
  sortOrder?: 'ascending' | 'descending'
}

/**
 * Adapt a SCIM list response to a pager page
 */
function toPage([status, payload]: ApiResult<unknown>): ApiResult<PageData<ScimUser>> {
  if (isRecord(payload) && Array.isArray(payload.Resources) && typeof payload.totalResults === 'number') {
    const items: ScimUser[] = payload.Resources
    return [status, { items, total: payload.totalResults }]
  }

  return [status, { items: [], total: 0 }]
}

export class UsersApi extends BaseApi {
  async addUser(user: NewScimUser, teamId = ''): Promise<ApiResult<string>> {
    const body = {
      displayName: user.displayName,
      emails: [{ primary: true, value: user.email }],
      locale: user.locale,
      name: user.formattedName ? { formatted: user.formattedName } : undefined,
      photos: user.photos?.map((value, index) => ({ primary: index === 0, type: 'photo', value })),
      preferredLanguage: user.preferredLanguage,
      schemas: [SCIM_USER_SCHEMA],
      userName: user.userName,
    }
    const result = await this.caller.call({ body, method: 'POST', url: `${this.server(teamId)}/scim/v2/Users`, write: true })
    return this.pluck(result, 'id')
  }

  async deleteUser(userId: string, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({ method: 'DELETE', url: `${this.server(teamId)}/scim/v2/Users/${userId}`, write: true })
  }

  /**
   * Pager over all users, `chunk` users per request
   */
  listUsers(start = 1, chunk = 10, teamId = ''): Pager<ScimUser> {
    return new Pager(async (index, count) => toPage(await this.listUsersRaw(index, count, teamId)), start, chunk)
  }

  /**
   * One page of users; `start` is 1-based
   */
  async listUsersRaw(start = 1, chunk = 10, teamId = ''): Promise<ApiResult<ScimListResponse>> {
    return this.caller.call({
      params: { count: chunk, startIndex: start },
      url: `${this.server(teamId)}/scim/v2/Users`,
    })
  }

  /**
   * Pager over the users matching a SCIM filter
   */
  searchUsers(search: UserSearch, start = 1, chunk = 10, teamId = ''): Pager<ScimUser> {
    return new Pager(async (index, count) => toPage(await this.searchUsersRaw(search, index, count, teamId)), start, chunk)
  }

  async searchUsersRaw(search: UserSearch, start = 1, chunk = 10, teamId = ''): Promise<ApiResult<ScimListResponse>> {
    const body = {
      count: chunk,
      filter: search.filter,
      schemas: [SCIM_SEARCH_SCHEMA],
      sortBy: search.sortBy,
      sortOrder: search.sortOrder,
      startIndex: start,
    }
    return this.caller.call({ body, method: 'POST', url: `${this.server(teamId)}/scim/v2/Users/.search` })
  }

  async seeMyself(teamId = ''): Promise<ApiResult<ScimUser>> {
    return this.caller.call({ url: `${this.server(teamId)}/scim/v2/Me` })
  }

  async seeScimConfig(teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    return this.caller.call({ url: `${this.server(teamId)}/scim/v2/ServiceProviderConfig` })
  }

  async seeScimResources(teamId = ''): Promise<ApiResult<Record<string, unknown>[]>> {
    return this.pluck(await this.caller.call({ url: `${this.server(teamId)}/scim/v2/ResourceTypes` }), 'Resources')
  }

  async seeScimSchemas(teamId = ''): Promise<ApiResult<Record<string, unknown>[]>> {
    return this.pluck(await this.caller.call({ url: `${this.server(teamId)}/scim/v2/Schemas` }), 'Resources')
  }

  async seeUser(userId: string, teamId = ''): Promise<ApiResult<ScimUser>> {
    return this.caller.call({ url: `${this.server(teamId)}/scim/v2/Users/${userId}` })
  }

  /**
   * Apply SCIM patch operations to a user
   */
  async updateUser(userId: string, operations: ScimOperation[], teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      body: { Operations: operations, schemas: [SCIM_PATCH_SCHEMA] },
      method: 'PATCH',
      url: `${this.server(teamId)}/scim/v2/Users/${userId}`,
      write: true,
    })
  }
}
