/**
 * Webhooks API module
 */

import type { GristWebhook, GristWebhookFields } from '../types.js'
import type { ApiResult } from './request.js'

import { BaseApi, isString } from './base.js'

export class WebhooksApi extends BaseApi {
  /**
   * Add webhooks; returns the new webhook ids
   */
  async addWebhooks(webhooks: GristWebhookFields[], docId = '', teamId = ''): Promise<ApiResult<string[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    const result = await this.caller.call({
      body: { webhooks: webhooks.map(fields => ({ fields })) },
      method: 'POST',
      url: `${server}/docs/${doc}/webhooks`,
      write: true,
    })
    return this.collectIds(result, 'webhooks', isString)
  }

  async deleteWebhook(webhookId: string, docId = '', teamId = ''): Promise<ApiResult<Record<string, unknown>>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ method: 'DELETE', url: `${server}/docs/${doc}/webhooks/${webhookId}`, write: true })
  }

  /**
   * Drop every payload waiting to be delivered
   */
  async emptyPayloadsQueue(docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({ method: 'DELETE', url: `${server}/docs/${doc}/webhooks/queue`, write: true })
  }

  async listWebhooks(docId = '', teamId = ''): Promise<ApiResult<GristWebhook[]>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.pluck(await this.caller.call({ url: `${server}/docs/${doc}/webhooks` }), 'webhooks')
  }

  async updateWebhook(webhookId: string, fields: GristWebhookFields, docId = '', teamId = ''): Promise<ApiResult<null>> {
    const { doc, server } = this.selectParams(docId, teamId)
    return this.caller.call({
      body: fields,
      method: 'PATCH',
      url: `${server}/docs/${doc}/webhooks/${webhookId}`,
      write: true,
    })
  }
}
