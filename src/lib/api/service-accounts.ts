/**
 * Service accounts API module
 */

import type { GristServiceAccount } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi } from './base.js'

export interface ServiceAccountFields {
  description?: string
  /** ISO date, YYYY-MM-DD */
  expiresAt?: string
  label?: string
}

export class ServiceAccountsApi extends BaseApi {
  async addServiceAccount(fields: ServiceAccountFields, teamId = ''): Promise<ApiResult<GristServiceAccount>> {
    return this.caller.call({ body: fields, method: 'POST', url: `${this.server(teamId)}/service-accounts`, write: true })
  }

  async deleteServiceAccount(accountId: number, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      method: 'DELETE',
      url: `${this.server(teamId)}/service-accounts/${accountId}`,
      write: true,
    })
  }

  async deleteServiceAccountKey(accountId: number, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      method: 'DELETE',
      url: `${this.server(teamId)}/service-accounts/${accountId}/apikey`,
      write: true,
    })
  }

  async listServiceAccounts(teamId = ''): Promise<ApiResult<GristServiceAccount[]>> {
    return this.caller.call({ url: `${this.server(teamId)}/service-accounts` })
  }

  /**
   * Replace the account key; the new key is in the response
   */
  async renewServiceAccountKey(accountId: number, teamId = ''): Promise<ApiResult<GristServiceAccount>> {
    return this.caller.call({
      method: 'POST',
      url: `${this.server(teamId)}/service-accounts/${accountId}/apikey`,
      write: true,
    })
  }

  async seeServiceAccount(accountId: number, teamId = ''): Promise<ApiResult<GristServiceAccount>> {
    return this.caller.call({ url: `${this.server(teamId)}/service-accounts/${accountId}` })
  }

  async updateServiceAccount(accountId: number, fields: ServiceAccountFields, teamId = ''): Promise<ApiResult<null>> {
    return this.caller.call({
      body: fields,
      method: 'PATCH',
      url: `${this.server(teamId)}/service-accounts/${accountId}`,
      write: true,
    })
  }
}
