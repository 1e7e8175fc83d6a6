/**
 * Tables API module (tables, columns)
 */

import type { GristColumn, GristTable, GristTableSpec } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi, isString } from './base.js'

export interface AddUpdateColsOptions {
  noadd?: boolean
  noupdate?: boolean
  replaceall?: boolean
}

/**
 * The service takes `widgetOptions` as a JSON-encoded string
 */
export function jsonizeColumnOptions(cols: GristColumn[]): GristColumn[] {
  return cols.map(col => {
    const { widgetOptions } = col.fields
    if (widgetOptions === undefined || typeof widgetOptions === 'string') return col
    return { ...col, fields: { ...col.fields, widgetOptions: JSON.stringify(widgetOptions) } }
  })
}

export class TablesApi extends BaseApi {
  /**
   * Add columns; returns the new column ids
   */
  async addCols(tableId: string, cols: GristColumn[], docId = '', teamId = ''): Promise<ApiResult<string[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      body: { columns: jsonizeColumnOptions(cols) },
      method: 'POST',
      url: `${server}/docs/${doc}/tables/${tableId}/columns`,
      write: true,
    })
    return this.collectIds(result, 'columns', isString)
  }

  /**
   * Add tables; returns the new table ids
   */
  async addTables(tables: GristTableSpec[], docId = '', teamId = ''): Promise<ApiResult<string[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      body: { tables: tables.map(table => ({ columns: jsonizeColumnOptions(table.columns), id: table.id })) },
      method: 'POST',
      url: `${server}/docs/${doc}/tables`,
      write: true,
    })
    return this.collectIds(result, 'tables', isString)
  }

  async addUpdateCols(
    tableId: string,
    cols: GristColumn[],
    options: AddUpdateColsOptions = {},
    docId = '',
    teamId = ''
  ): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { columns: jsonizeColumnOptions(cols) },
      method: 'PUT',
      params: {
        noadd: options.noadd ?? true,
        noupdate: options.noupdate ?? true,
        replaceall: options.replaceall ?? false,
      },
      url: `${server}/docs/${doc}/tables/${tableId}/columns`,
      write: true,
    })
  }

  async deleteColumn(tableId: string, colId: string, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      method: 'DELETE',
      url: `${server}/docs/${doc}/tables/${tableId}/columns/${colId}`,
      write: true,
    })
  }

  async listCols(tableId: string, hidden = false, docId = '', teamId = ''): Promise<ApiResult<GristColumn[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      params: { hidden: hidden || undefined },
      url: `${server}/docs/${doc}/tables/${tableId}/columns`,
    })
    return this.pluck(result, 'columns')
  }

  async listTables(docId = '', teamId = ''): Promise<ApiResult<GristTable[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.pluck(await this.caller.call({ url: `${server}/docs/${doc}/tables` }), 'tables')
  }

  async updateCols(tableId: string, cols: GristColumn[], docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { columns: jsonizeColumnOptions(cols) },
      method: 'PATCH',
      url: `${server}/docs/${doc}/tables/${tableId}/columns`,
      write: true,
    })
  }

  async updateTables(tables: GristTable[], docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ body: { tables }, method: 'PATCH', url: `${server}/docs/${doc}/tables`, write: true })
  }
}
