/**
 * Pure helpers behind the command line: status synthesis, output levels and
 * parsing of the positional shorthands commands accept
 */

import type { TransportFailureKind } from './errors.js'
import type { GristColumn, GristFields, GristRole, ScimUser } from './types.js'

/** Exit code for a call answered with a bad status, or not answered */
export const EXIT_BAD_STATUS = 3

/** Exit code for a malformed invocation */
export const EXIT_BAD_INVOCATION = 2

export const TRANSPORT_STATUS: Readonly<Record<TransportFailureKind, number>> = {
  'invalid-url': 523,
  refused: 521,
  timeout: 522,
  unknown: 520,
  unreachable: 523,
}

export type OutputLevel = 0 | 1 | 2

export const ACCESS_CHOICES = ['owners', 'editors', 'viewers', 'members', 'none'] as const
export type AccessChoice = (typeof ACCESS_CHOICES)[number]

/**
 * Thrown by the parsers below, reported as a malformed invocation
 */
export class InvocationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvocationError'
  }
}

/**
 * Status reported in place of a response that never came
 */
export function transportStatus(kind: TransportFailureKind): number {
  return TRANSPORT_STATUS[kind]
}

/**
 * Text for one output level: formatted content, library payload, raw body
 */
export function renderOutput(level: OutputLevel, content: string, payload: unknown, raw: null | string): string {
  switch (level) {
    case 0: {
      return content
    }

    case 1: {
      return JSON.stringify(payload, null, 2) ?? 'null'
    }

    case 2: {
      return raw ?? 'null'
    }
  }
}

/**
 * `none` revokes access
 */
export function toRole(access: AccessChoice): GristRole | null {
  return access === 'none' ? null : access
}

/**
 * `id:type:label` column shorthands; type defaults to Any, label to the id
 */
export function parseColumnSpecs(specs: string[]): GristColumn[] {
  return specs.map(spec => {
    const [id, type, ...label] = spec.split(':')
    if (!id) {
      throw new InvocationError(`Invalid column "${spec}": expected id:type:label`)
    }

    return { fields: { label: label.length > 0 ? label.join(':') : id, type: type || 'Any' }, id }
  })
}

/**
 * `col:value` pairs; the first colon separates name from value
 */
export function parseFieldPairs(pairs: string[]): GristFields {
  const fields: GristFields = {}
  for (const pair of pairs) {
    const at = pair.indexOf(':')
    if (at <= 0) {
      throw new InvocationError(`Invalid field "${pair}": expected col:value`)
    }

    fields[pair.slice(0, at)] = pair.slice(at + 1)
  }

  return fields
}

/**
 * Split a leading `id:N` pair from the field pairs of a record update
 */
export function parseRecordUpdate(pairs: string[]): { fields: GristFields; id: number } {
  const { id, ...fields } = parseFieldPairs(pairs)
  const rowId = typeof id === 'string' && /^\d+$/.test(id) ? Number.parseInt(id, 10) : Number.NaN
  if (Number.isNaN(rowId)) {
    throw new InvocationError('The record id must be given as id:N with N a number')
  }

  return { fields, id: rowId }
}

export const TABLE_OPTIONS = [
  'onDemand',
  'primaryViewId',
  'rawViewSectionRef',
  'recordCardViewSectionRef',
  'summarySourceTable',
] as const

const TABLE_OPTION_SET: ReadonlySet<string> = new Set(TABLE_OPTIONS)

/**
 * `key=value` table metadata; onDemand takes true or false, the others integers
 */
export function parseTableOptions(options: string[]): GristFields {
  const fields: GristFields = {}
  for (const option of options) {
    const at = option.indexOf('=')
    if (at <= 0) {
      throw new InvocationError(`Invalid option "${option}": expected key=value`)
    }

    const key = option.slice(0, at)
    const value = option.slice(at + 1)
    if (!TABLE_OPTION_SET.has(key)) {
      throw new InvocationError(`Unknown table option "${key}", expected one of: ${TABLE_OPTIONS.join(', ')}`)
    }

    if (key === 'onDemand') {
      if (value !== 'true' && value !== 'false') {
        throw new InvocationError(`Option ${key} takes true or false`)
      }

      fields[key] = value === 'true'
    } else if (/^-?\d+$/.test(value)) {
      fields[key] = Number.parseInt(value, 10)
    } else {
      throw new InvocationError(`Option ${key} takes an integer`)
    }
  }

  return fields
}

/**
 * Webhook events shorthand: `add:update`
 */
export function parseEvents(events: string): string[] {
  return events.split(':').filter(Boolean)
}

/**
 * Key/value rows describing a SCIM user
 */
export function scimUserPairs(user: ScimUser): Array<[string, unknown]> {
  const emails = (user.emails ?? []).map(email => (email.primary ? `${email.value} (primary)` : email.value))
  return [
    ['id', user.id],
    ['name', user.userName],
    ['display name', user.displayName ?? ''],
    ['email', emails.join(', ')],
  ]
}
