/**
 * Attachments API module (files, archives, external stores)
 */

import type { AttachmentStoreType, GristAttachment } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi } from './base.js'

export type ArchiveFormat = 'tar' | 'zip'

export interface ListAttachmentsOptions {
  filter?: Record<string, unknown[]>
  limit?: number
  sort?: string
}

export class AttachmentsApi extends BaseApi {
  async downloadAttachment(filename: string, attachmentId: number, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename,
      headers: { Accept: '*/*' },
      url: `${server}/docs/${doc}/attachments/${attachmentId}/download`,
    })
  }

  /**
   * Download every attachment of the document as one archive
   */
  async downloadAttachments(filename: string, format: ArchiveFormat = 'tar', docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      download: filename,
      headers: { Accept: '*/*' },
      params: { format },
      url: `${server}/docs/${doc}/attachments/archive`,
    })
  }

  async listAttachments(options: ListAttachmentsOptions = {}, docId = '', teamId = ''): Promise<ApiResult<GristAttachment[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      params: {
        filter: options.filter ? JSON.stringify(options.filter) : undefined,
        limit: options.limit || undefined,
        sort: options.sort || undefined,
      },
      url: `${server}/docs/${doc}/attachments`,
    })
    return this.pluck(result, 'records')
  }

  async listStoreSettings(docId = '', teamId = ''): Promise<ApiResult<Record<string, unknown>[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.pluck(await this.caller.call({ url: `${server}/docs/${doc}/attachments/stores` }), 'stores')
  }

  async seeAttachment(attachmentId: number, docId = '', teamId = ''): Promise<ApiResult<GristAttachment>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ url: `${server}/docs/${doc}/attachments/${attachmentId}` })
  }

  /**
   * Type of the store new attachments go to
   */
  async seeAttachmentStore(docId = '', teamId = ''): Promise<ApiResult<AttachmentStoreType>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.pluck(await this.caller.call({ url: `${server}/docs/${doc}/attachments/store` }), 'type')
  }

  async seeTransferStatus(docId = '', teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ url: `${server}/docs/${doc}/attachments/transferStatus` })
  }

  /**
   * Start moving every attachment to the current store
   */
  async transferAttachments(docId = '', teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ method: 'POST', url: `${server}/docs/${doc}/attachments/transferAll`, write: true })
  }

  async updateAttachmentStore(type: AttachmentStoreType, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ body: { type }, method: 'POST', url: `${server}/docs/${doc}/attachments/store`, write: true })
  }

  /**
   * Upload files as attachments; returns the new attachment ids
   */
  async uploadAttachments(filePaths: string[], docId = '', teamId = ''): Promise<ApiResult<number[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      method: 'POST',
      upload: { field: 'upload', filePaths },
      url: `${server}/docs/${doc}/attachments`,
      write: true,
    })
  }

  /**
   * Restore missing attachments from an archive made by `downloadAttachments`
   */
  async uploadRestoreAttachments(filename: string, docId = '', teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      method: 'POST',
      upload: { field: 'file', filePaths: [filename] },
      url: `${server}/docs/${doc}/attachments/archive`,
      write: true,
    })
  }
}
