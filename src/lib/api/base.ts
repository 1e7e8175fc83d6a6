/**
 * Base API class with common properties
 */

import type { Configurator } from '../config.js'
import type { ConverterRegistry, FieldValues } from '../converters.js'
import type { ApiCaller, ApiResult } from './request.js'

import { applyInputConverters, applyOutputConverters } from '../converters.js'
import { isSuccess } from './request.js'

/**
 * Converter registries shared by reference across domain APIs
 */
export interface ConverterSet {
  inConverters: ConverterRegistry
  outConverters: ConverterRegistry
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number'
}

export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Base class providing common API properties
 */
export class BaseApi {
  constructor(
    protected caller: ApiCaller,
    protected converters: ConverterSet
  ) {}

  protected get configurator(): Configurator {
    return this.caller.configurator
  }

  /**
   * Ids of `{[key]: [{id}, ...]}` after a successful write
   */
  protected collectIds<T extends number | string>(
    result: ApiResult,
    key: string,
    isId: (value: unknown) => value is T
  ): ApiResult<T[]> {
    const [status, payload] = result
    const list = isRecord(payload) ? payload[key] : undefined
    if (isSuccess(status) && Array.isArray(list)) {
      return [status, list.filter(isRecord).map(item => item.id).filter(isId)]
    }

    // Error body from the service
    return [status, payload as T[]]
  }

  protected convertIn<R extends FieldValues>(table: string, records: R[]): R[] {
    return applyInputConverters(this.converters.inConverters, table, records)
  }

  protected convertOut<R extends FieldValues>(table: string, records: R[]): R[] {
    return applyOutputConverters(this.converters.outConverters, table, records)
  }

  /**
   * Unwrap a list payload from its envelope key, when present
   */
  protected pluck<T>(result: ApiResult, key: string): ApiResult<T> {
    const [status, payload] = result
    if (isRecord(payload) && key in payload) {
      // Shape of the enveloped value is the endpoint's contract
      return [status, payload[key] as T]
    }

    return [status, payload as T]
  }

  /**
   * Document id and server base url, defaulting to the configured ones
   */
  protected selectParams(docId = '', teamId = ''): { doc: string; server: string } {
    return {
      doc: docId || this.configurator.docId,
      server: this.configurator.serverUrl(teamId),
    }
  }

  protected server(teamId = ''): string {
    return this.configurator.serverUrl(teamId)
  }

  protected team(teamId = ''): string {
    return teamId || this.configurator.config.GRIST_TEAM_SITE
  }

  protected workspace(wsId = 0): number {
    return wsId || this.configurator.workspaceId
  }
}
