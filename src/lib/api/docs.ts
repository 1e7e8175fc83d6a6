/**
 * Documents API module (metadata, access, downloads)
 */

import type { AccessDelta, GristAccessUser, GristDoc, MaxInheritedRole } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi } from './base.js'

export type DownloadHeader = 'colId' | 'label'

const BINARY_ACCEPT = { Accept: '*/*' }

export class DocsApi extends BaseApi {
  /**
   * Create a document in a workspace; returns the new document id
   */
  async addDoc(name: string, pinned = false, wsId = 0, teamId = ''): Promise<ApiResult<string>> {
    return this.caller.call({
      body: { isPinned: pinned, name },
      method: 'POST',
      url: `${this.server(teamId)}/workspaces/${this.workspace(wsId)}/docs`,
      write: true,
    })
  }

  /**
   * Copy a document into a workspace; returns the new document id
   */
  async copyDoc(wsId: number, name: string, asTemplate = false, docId = '', teamId = ''): Promise<ApiResult<string>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { asTemplate, documentName: name, workspaceId: this.workspace(wsId) },
      method: 'POST',
      url: `${server}/docs/${doc}/copy`,
      write: true,
    })
  }

  async deleteDoc(docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ method: 'DELETE', url: `${server}/docs/${doc}`, write: true })
  }

  /**
   * Remove document history, keeping the latest `keep` states
   */
  async deleteDocHistory(keep = 0, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ body: { keep }, method: 'POST', url: `${server}/docs/${doc}/states/remove`, write: true })
  }

  async downloadCsv(filename: string, tableId: string, header: DownloadHeader = 'label', docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename,
      headers: BINARY_ACCEPT,
      params: { header, tableId },
      url: `${server}/docs/${doc}/download/csv`,
    })
  }

  async downloadExcel(filename: string, tableId: string, header: DownloadHeader = 'label', docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename,
      headers: BINARY_ACCEPT,
      params: { header, tableId },
      url: `${server}/docs/${doc}/download/xlsx`,
    })
  }

  /**
   * Table schema as a frictionless data package; written to `filename`
   * when given, returned otherwise
   */
  async downloadSchema(
    tableId: string,
    header: DownloadHeader = 'label',
    filename = '',
    docId = '',
    teamId = ''
  ): Promise<ApiResult<null | Record<string, unknown>>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename || undefined,
      params: { header, tableId },
      url: `${server}/docs/${doc}/download/table-schema`,
    })
  }

  async downloadSqlite(filename: string, nohistory = false, template = false, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename,
      headers: BINARY_ACCEPT,
      params: { nohistory, template },
      url: `${server}/docs/${doc}/download`,
    })
  }

  async listDocUsers(docId = '', teamId = ''): Promise<ApiResult<GristAccessUser[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.pluck(await this.caller.call({ url: `${server}/docs/${doc}/access` }), 'users')
  }

  async moveDoc(wsId: number, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ body: { workspace: wsId }, method: 'PATCH', url: `${server}/docs/${doc}/move`, write: true })
  }

  /**
   * Force the document to reload on the server
   */
  async reloadDoc(docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ method: 'POST', url: `${server}/docs/${doc}/force-reload`, write: true })
  }

  async seeDoc(docId = '', teamId = ''): Promise<ApiResult<GristDoc>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ url: `${server}/docs/${doc}` })
  }

  /**
   * Rename and/or pin a document; an empty name leaves it unchanged
   */
  async updateDoc(newName = '', pinned?: boolean, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const body: { isPinned?: boolean; name?: string } = {}
    if (newName) body.name = newName
    if (pinned !== undefined) body.isPinned = pinned
    return this.caller.call({ body, method: 'PATCH', url: `${server}/docs/${doc}`, write: true })
  }

  async updateDocUsers(
    users: AccessDelta,
    maxInheritedRole: MaxInheritedRole = 'owners',
    docId = '',
    teamId = ''
  ): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: { delta: { maxInheritedRole, users } },
      method: 'PATCH',
      url: `${server}/docs/${doc}/access`,
      write: true,
    })
  }
}
