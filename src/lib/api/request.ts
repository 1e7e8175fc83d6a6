/**
 * Core API request engine and types
 */

import { openAsBlob } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { basename } from 'node:path'

import type { Configurator } from '../config.js'

import { formatConfig, maskApiKey } from '../config.js'
import { classifyTransportFailure, HttpError, SafeModeError, TransportError } from '../errors.js'
import { logger } from '../logger.js'

/**
 * Result of every endpoint function. When the status is not successful
 * the payload is the service's own error body.
 */
export type ApiResult<T = unknown> = [status: number, payload: T]

export type HttpMethod = 'DELETE' | 'GET' | 'PATCH' | 'POST' | 'PUT'

export type QueryParams = Record<string, boolean | number | string | undefined>

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

/**
 * Status and payload of the fake response synthesized by dry-run and safe mode
 */
export const DRY_RUN_STATUS = 418
export const DRY_RUN_REASON = "I'm a teapot"
export const DRY_RUN_PAYLOAD = { warning: 'Dry run: the request was not sent' }

export interface UploadSpec {
  /** Form field name the files are sent under */
  field: string
  filePaths: string[]
}

export interface CallOptions {
  body?: unknown
  /** Write a successful response body to this file instead of parsing it */
  download?: string
  headers?: Record<string, string>
  method?: HttpMethod
  params?: QueryParams
  upload?: UploadSpec
  url: string
  /** Writing call, blocked in safe mode */
  write?: boolean
}

export interface RequestOptions {
  headers?: Record<string, string>
  /** Seconds; 0 or undefined means no timeout */
  timeout?: number
}

export interface TransactionRequest {
  body?: string
  headers: Record<string, string>
  method: string
  url: string
}

export interface TransactionResponse {
  content: string
  headers: Record<string, string>
  reason: string
  status: number
}

/**
 * The last call attempt. `response` belongs to the last attempt that got
 * one: after a transport failure it is left in place and tagged stale.
 */
export interface TransactionRecord {
  request?: TransactionRequest
  response?: TransactionResponse
  responseStale: boolean
}

export interface ApiCallerOptions {
  fetch?: FetchLike
  maxSavedResponse?: number
  requestOptions?: RequestOptions
  saveBinaryResponse?: boolean
}

/**
 * Build an absolute url with a url-encoded query string (spaces as %20)
 */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url

  const query = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&')

  if (!query) return url
  return `${url}${url.includes('?') ? '&' : '?'}${query}`
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {}
  for (const [key, value] of headers.entries()) {
    record[key] = value
  }

  return record
}

function isTextual(contentType: string): boolean {
  return contentType === '' || /json|text|xml|csv/i.test(contentType)
}

function parsePayload(text: string): unknown {
  if (text === '') return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * Sends one HTTP request per call and keeps the last transaction for inspection
 */
export class ApiCaller {
  apiCalls = 0
  dryRun = false
  maxSavedResponse: number
  ok = false
  requestOptions: RequestOptions
  saveBinaryResponse: boolean
  private readonly fetchImpl: FetchLike
  private record: TransactionRecord = { responseStale: false }
  private sessionOpen = false

  constructor(
    readonly configurator: Configurator,
    options: ApiCallerOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.maxSavedResponse = options.maxSavedResponse ?? 5000
    this.requestOptions = { ...options.requestOptions }
    this.saveBinaryResponse = options.saveBinaryResponse ?? false
  }

  get inSession(): boolean {
    return this.sessionOpen
  }

  get transaction(): Readonly<TransactionRecord> {
    return this.record
  }

  /**
   * Issue one API call, or fake it in dry-run/safe mode
   */
  async call<T = unknown>(options: CallOptions): Promise<ApiResult<T>> {
    const method = options.method ?? 'GET'
    const url = buildUrl(options.url, options.params)
    const headers = this.buildHeaders(options)

    let body: FormData | string | undefined
    let savedBody: string | undefined
    if (options.upload) {
      body = await this.buildForm(options.upload)
      savedBody = `<multipart: ${options.upload.filePaths.map(filePath => basename(filePath)).join(', ')}>`
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body)
      savedBody = body
    }

    this.record = {
      request: { body: savedBody, headers, method, url },
      response: this.record.response,
      responseStale: true,
    }

    const safeModeBlock = Boolean(options.write) && this.configurator.safeMode
    if (this.dryRun || safeModeBlock) {
      return this.fakeResponse<T>(method, url, safeModeBlock)
    }

    logger.apiCall(method, url)
    if (savedBody !== undefined) {
      logger.requestBody(savedBody)
    }

    const requestId = `api-${this.apiCalls}-${Date.now()}`
    logger.timeStart(requestId, `${method} ${url}`)

    let response: Response
    const startTime = performance.now()
    try {
      response = await this.fetchImpl(url, {
        body,
        headers,
        method,
        signal: this.requestOptions.timeout ? AbortSignal.timeout(this.requestOptions.timeout * 1000) : undefined,
      })
    } catch (error) {
      logger.timeEnd(requestId)
      throw this.transportFailure(url, error)
    }

    const durationMs = Math.round(performance.now() - startTime)
    logger.timeEnd(requestId)
    logger.apiResponse(response.status, response.statusText, durationMs)

    // The body can still fail mid-stream; the call only counts once it is read
    const success = isSuccess(response.status)
    let data: Buffer | undefined
    let text = ''
    try {
      if (options.download && success) {
        data = Buffer.from(await response.arrayBuffer())
      } else {
        text = await response.text()
      }
    } catch (error) {
      throw this.transportFailure(url, error)
    }

    this.apiCalls++
    this.ok = success

    let payload: unknown = null
    if (options.download && data) {
      this.storeResponse(response, this.saveBinaryResponse ? data.toString('utf8') : `<binary content: ${data.length} bytes>`)
      logger.fileOp('write', options.download)
      await writeFile(options.download, data)
    } else {
      payload = parsePayload(text)
      const textual = isTextual(response.headers.get('content-type') ?? '')
      this.storeResponse(response, textual || this.saveBinaryResponse ? text : '<not a valid json>')
      logger.responseData(payload)
    }

    if (!this.ok && this.configurator.raiseOnError) {
      throw new HttpError(response.status, response.statusText, url, payload)
    }

    // Payload shape is the endpoint's contract with the service
    return [response.status, payload as T]
  }

  /**
   * Stop reusing connections between calls
   */
  closeSession(): void {
    this.sessionOpen = false
    logger.verbose('Session closed')
  }

  /**
   * Human-readable dump of the last transaction, with the API key masked
   */
  inspect(sep = '\n', maxContent = 1000): string {
    const { request, response, responseStale } = this.record
    if (!request) {
      return 'No API call was made yet'
    }

    const headers = { ...request.headers }
    if (headers.Authorization) {
      const [scheme, key = ''] = headers.Authorization.split(' ')
      headers.Authorization = `${scheme} ${maskApiKey(key)}`
    }

    const stale = responseStale ? ' (stale)' : ''
    const lines = [
      `->Url: ${request.url}`,
      `->Method: ${request.method}`,
      `->Headers: ${JSON.stringify(headers)}`,
      `->Body: ${request.body ?? ''}`,
    ]
    if (response) {
      const content = response.content.length > maxContent
        ? `${response.content.slice(0, maxContent)}...`
        : response.content
      lines.push(
        `->Response: ${response.status}, ${response.reason}${stale}`,
        `->Resp. headers: ${JSON.stringify(response.headers)}`,
        `->Resp. content: ${content}`
      )
    } else {
      lines.push('->Response: <none>')
    }

    lines.push(`->Config: ${formatConfig(this.configurator.config)}`)
    return lines.join(sep)
  }

  /**
   * Reuse connections between calls until closed
   */
  openSession(): void {
    this.sessionOpen = true
    logger.verbose('Session opened')
  }

  /**
   * Saved body of the last response, or null if the last attempt got none
   */
  responseAsJson(): null | string {
    const { response, responseStale } = this.record
    if (!response || responseStale) return null
    return response.content
  }

  private async buildForm(upload: UploadSpec): Promise<FormData> {
    const form = new FormData()
    for (const filePath of upload.filePaths) {
      logger.fileOp('read', filePath)
      form.append(upload.field, await openAsBlob(filePath), basename(filePath))
    }

    return form
  }

  private buildHeaders(options: CallOptions): Record<string, string> {
    const headers: Record<string, string> = options.upload
      ? { Accept: 'application/json' }
      : { Accept: 'application/json', 'Content-Type': 'application/json' }

    Object.assign(headers, this.requestOptions.headers, options.headers)
    headers.Authorization = `Bearer ${this.configurator.config.GRIST_API_KEY}`
    headers.Connection = this.sessionOpen ? 'keep-alive' : 'close'
    return headers
  }

  private fakeResponse<T>(method: string, url: string, safeModeBlock: boolean): ApiResult<T> {
    const content = JSON.stringify(DRY_RUN_PAYLOAD)
    this.record.response = {
      content,
      headers: { 'content-type': 'application/json' },
      reason: DRY_RUN_REASON,
      status: DRY_RUN_STATUS,
    }
    this.record.responseStale = false
    this.ok = false

    if (safeModeBlock) {
      logger.dryRun(method, url, 'safe-mode')
      throw new SafeModeError(
        `Safe mode is on: writing calls are blocked.\nConfiguration:\n${formatConfig(this.configurator.config, true)}`
      )
    }

    logger.dryRun(method, url, 'dry-run')
    // The sentinel is returned in place of whatever the endpoint would give
    const sentinel: unknown = { ...DRY_RUN_PAYLOAD }
    return [DRY_RUN_STATUS, sentinel as T]
  }

  private storeResponse(response: Response, content: string): void {
    this.record.response = {
      content: content.length > this.maxSavedResponse ? content.slice(0, this.maxSavedResponse) : content,
      headers: headersToRecord(response.headers),
      reason: response.statusText,
      status: response.status,
    }
    this.record.responseStale = false
  }

  private transportFailure(url: string, error: unknown): TransportError {
    const kind = classifyTransportFailure(error)
    const reason = error instanceof Error ? error.message : String(error)
    logger.debug('Request failed:', kind, reason)
    this.ok = false
    return new TransportError(`Request to ${url} failed (${kind}): ${reason}`, kind, url, { cause: error })
  }
}
