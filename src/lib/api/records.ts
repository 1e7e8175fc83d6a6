/**
 * Records API module
 *
 * Records are exchanged flat: `{id, ...fields}` when read, plain field
 * objects when written. Converters for the table run on the flat shape.
 */

import type { GristFields, GristRecord, GristUpsert } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi, isNumber, isRecord } from './base.js'
import { isSuccess } from './request.js'

export interface ListRecordsOptions {
  /** Column id → accepted values */
  filter?: Record<string, unknown[]>
  hidden?: boolean
  limit?: number
  /** Comma-separated column ids, `-` prefix for descending */
  sort?: string
}

export interface AddUpdateOptions {
  allowEmptyRequire?: boolean
  noadd?: boolean
  noparse?: boolean
  noupdate?: boolean
  onmany?: 'all' | 'first' | 'none'
}

/**
 * `[{id, fields: {...}}]` → `[{id, ...fields}]`
 */
export function flattenRecords(records: unknown[]): GristRecord[] {
  return records.filter(isRecord).map(record => {
    const fields = isRecord(record.fields) ? record.fields : {}
    return { ...fields, id: typeof record.id === 'number' ? record.id : Number(record.id) }
  })
}

export class RecordsApi extends BaseApi {
  /**
   * Add records; returns the new row ids
   */
  async addRecords(tableId: string, records: GristFields[], noparse = false, docId = '', teamId = ''): Promise<ApiResult<number[]>> {
    const converted = this.convertIn(tableId, records)
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      body: { records: converted.map(fields => ({ fields })) },
      method: 'POST',
      params: { noparse },
      url: `${server}/docs/${doc}/tables/${tableId}/records`,
      write: true,
    })
    return this.collectIds(result, 'records', isNumber)
  }

  /**
   * Add or update records matched on their `require` fields
   */
  async addUpdateRecords(
    tableId: string,
    records: GristUpsert[],
    options: AddUpdateOptions = {},
    docId = '',
    teamId = ''
  ): Promise<ApiResult<null>> {
    const require = this.convertIn(tableId, records.map(record => record.require))
    const fields = this.convertIn(tableId, records.map(record => record.fields ?? {}))
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { records: records.map((_, index) => ({ fields: fields[index], require: require[index] })) },
      method: 'PUT',
      params: {
        allow_empty_require: options.allowEmptyRequire ?? false, // eslint-disable-line camelcase
        noadd: options.noadd ?? false,
        noparse: options.noparse ?? false,
        noupdate: options.noupdate ?? false,
        onmany: options.onmany ?? 'first',
      },
      url: `${server}/docs/${doc}/tables/${tableId}/records`,
      write: true,
    })
  }

  async deleteRows(tableId: string, rowIds: number[], docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: rowIds,
      method: 'POST',
      url: `${server}/docs/${doc}/tables/${tableId}/data/delete`,
      write: true,
    })
  }

  async listRecords(tableId: string, options: ListRecordsOptions = {}, docId = '', teamId = ''): Promise<ApiResult<GristRecord[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const headers: Record<string, string> = {}
    if (options.sort) headers['X-Sort'] = options.sort
    if (options.limit) headers['X-Limit'] = String(options.limit)

    const [status, payload] = await this.caller.call({
      headers,
      params: {
        filter: options.filter ? JSON.stringify(options.filter) : undefined,
        hidden: options.hidden || undefined,
      },
      url: `${server}/docs/${doc}/tables/${tableId}/records`,
    })

    if (isSuccess(status) && isRecord(payload) && Array.isArray(payload.records)) {
      return [status, this.convertOut(tableId, flattenRecords(payload.records))]
    }

    return [status, payload as GristRecord[]]
  }

  /**
   * Update records by id; each record carries its `id` and the fields to change
   */
  async updateRecords(tableId: string, records: GristRecord[], noparse = false, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const converted = this.convertIn(tableId, records)
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { records: converted.map(({ id, ...fields }) => ({ fields, id })) },
      method: 'PATCH',
      params: { noparse },
      url: `${server}/docs/${doc}/tables/${tableId}/records`,
      write: true,
    })
  }
}
