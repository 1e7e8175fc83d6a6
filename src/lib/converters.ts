/**
 * Per-column converter pipeline
 *
 * Input converters run on outbound records before anything is sent,
 * output converters run on every received field.
 */

import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'

import { logger } from './logger.js'

export type Converter = (value: unknown) => unknown

/**
 * table id → column id → converter
 */
export type ConverterRegistry = Record<string, Record<string, Converter>>

export type FieldValues = Record<string, unknown>

/**
 * Reserved table key for the results of ad hoc sql queries
 */
export const SQL_CONVERTER_KEY = '$SQL'

/**
 * Value/type-domain failures, downgraded by output converters
 */
function isDomainError(error: unknown): boolean {
  return error instanceof TypeError || error instanceof RangeError
}

/**
 * Run input converters on a batch of records. All records are converted
 * before returning, so a failure on any of them aborts the whole batch.
 */
export function applyInputConverters<R extends FieldValues>(
  registry: ConverterRegistry,
  table: string,
  records: R[]
): R[] {
  const converters = registry[table]
  if (!converters) return records

  return records.map(record => {
    const converted: R = { ...record }
    for (const [column, convert] of Object.entries(converters)) {
      if (column in converted) {
        Object.assign(converted, { [column]: convert(converted[column]) })
      }
    }

    return converted
  })
}

/**
 * Run one output converter, never failing on a value/type-domain error
 */
export function convertOutputValue(convert: Converter, value: unknown): unknown {
  try {
    return convert(value)
  } catch (error) {
    if (!isDomainError(error)) throw error
    logger.debug('Output converter failed, falling back to string:', error instanceof Error ? error.message : error)
    return value === null || value === undefined ? null : String(value)
  }
}

/**
 * Run output converters on received records
 */
export function applyOutputConverters<R extends FieldValues>(
  registry: ConverterRegistry,
  table: string,
  records: R[]
): R[] {
  const converters = registry[table]
  if (!converters) return records

  return records.map(record => {
    const converted: R = { ...record }
    for (const [column, convert] of Object.entries(converters)) {
      if (column in converted) {
        Object.assign(converted, { [column]: convertOutputValue(convert, converted[column]) })
      }
    }

    return converted
  })
}

export interface ConverterModule {
  inConverters: ConverterRegistry
  outConverters: ConverterRegistry
}

function isConverter(value: unknown): value is Converter {
  return typeof value === 'function'
}

/**
 * Keep only well-formed table → column → function entries
 */
function toRegistry(exported: unknown, source: string): ConverterRegistry {
  const registry: ConverterRegistry = {}
  if (typeof exported !== 'object' || exported === null) return registry

  for (const [table, columns] of Object.entries(exported)) {
    if (typeof columns !== 'object' || columns === null) {
      logger.warn(`${source}: converters for table "${table}" must be an object`)
      continue
    }

    registry[table] = {}
    for (const [column, convert] of Object.entries(columns)) {
      if (isConverter(convert)) {
        registry[table][column] = convert
      } else {
        logger.warn(`${source}: converter ${table}.${column} is not a function`)
      }
    }
  }

  return registry
}

export const CONVERTER_MODULE_NAMES = ['gristconverters.js', 'gristconverters.mjs']

/**
 * Load converters from an optional module in a directory.
 * The module exports `inConverters` and/or `outConverters`.
 */
export async function loadConverterModule(directory: string): Promise<ConverterModule> {
  for (const name of CONVERTER_MODULE_NAMES) {
    const filePath = join(directory, name)
    if (!existsSync(filePath)) continue

    logger.fileOp('read', filePath)
    const module: Record<string, unknown> = await import(pathToFileURL(filePath).href)
    return {
      inConverters: toRegistry(module.inConverters, name),
      outConverters: toRegistry(module.outConverters, name),
    }
  }

  return { inConverters: {}, outConverters: {} }
}
