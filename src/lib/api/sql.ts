/**
 * SQL API module
 *
 * Queries are read-only, so neither call is blocked in safe mode.
 */

import type { GristFields } from '../types.js'
import type { ApiResult } from './request.js'

import { SQL_CONVERTER_KEY } from '../converters.js'
import { BaseApi, isRecord } from './base.js'
import { isSuccess } from './request.js'

export class SqlApi extends BaseApi {
  async runSql(sql: string, docId = '', teamId = ''): Promise<ApiResult<GristFields[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.toRows(await this.caller.call({ params: { q: sql }, url: `${server}/docs/${doc}/sql` }))
  }

  /**
   * Parametrized query, `?` placeholders bound to `args`; timeout in milliseconds
   */
  async runSqlWithArgs(sql: string, args: unknown[], timeout = 1000, docId = '', teamId = ''): Promise<ApiResult<GristFields[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      body: { args, sql, timeout },
      method: 'POST',
      url: `${server}/docs/${doc}/sql`,
    })
    return this.toRows(result)
  }

  /**
   * `{records: [{fields}]}` → converted rows
   */
  private toRows([status, payload]: ApiResult): ApiResult<GristFields[]> {
    if (isSuccess(status) && isRecord(payload) && Array.isArray(payload.records)) {
      const rows = payload.records.filter(isRecord).map(record => (isRecord(record.fields) ? record.fields : {}))
      return [status, this.convertOut(SQL_CONVERTER_KEY, rows)]
    }

    return [status, payload as GristFields[]]
  }
}
