/**
 * Layered configuration resolver
 *
 * Precedence: built-in defaults < config files < environment < overrides.
 * The snapshot object is shared by reference with the transport engine and
 * the endpoint functions, so it is always mutated in place.
 */

import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'

import { ConfigurationError } from './errors.js'
import { logger } from './logger.js'

export const CONFIG_KEYS = [
  'GRIST_API_KEY',
  'GRIST_SELF_MANAGED',
  'GRIST_SELF_MANAGED_HOME',
  'GRIST_SELF_MANAGED_SINGLE_ORG',
  'GRIST_SERVER_PROTOCOL',
  'GRIST_API_SERVER',
  'GRIST_API_ROOT',
  'GRIST_TEAM_SITE',
  'GRIST_WORKSPACE_ID',
  'GRIST_DOC_ID',
  'GRIST_RAISE_ERROR',
  'GRIST_SAFEMODE',
] as const

export type ConfigKey = (typeof CONFIG_KEYS)[number]

/**
 * Every recognized key always has a value; extension keys pass through
 */
export type ConfigSnapshot = Record<ConfigKey, string> & Record<string, string>

export type ConfigOverrides = Record<string, string>

export const DEFAULT_CONFIG: Readonly<Record<ConfigKey, string>> = {
  GRIST_API_KEY: '<your_api_key_here>',
  GRIST_SELF_MANAGED: 'N',
  GRIST_SELF_MANAGED_HOME: 'http://localhost:8484',
  GRIST_SELF_MANAGED_SINGLE_ORG: 'Y',
  GRIST_SERVER_PROTOCOL: 'https://',
  GRIST_API_SERVER: 'getgrist.com',
  GRIST_API_ROOT: 'api',
  GRIST_TEAM_SITE: 'docs',
  GRIST_WORKSPACE_ID: '0',
  GRIST_DOC_ID: '<your_doc_id_here>',
  GRIST_RAISE_ERROR: 'Y',
  GRIST_SAFEMODE: 'N',
}

const nonEmpty = z.string().min(1, 'must be a non-empty string')
const yesNo = z.enum(['Y', 'N'], { errorMap: () => ({ message: 'must be "Y" or "N"' }) })

const snapshotSchema = z
  .object({
    GRIST_API_KEY: nonEmpty,
    GRIST_API_ROOT: nonEmpty,
    GRIST_API_SERVER: nonEmpty,
    GRIST_DOC_ID: nonEmpty,
    GRIST_RAISE_ERROR: yesNo,
    GRIST_SAFEMODE: yesNo,
    GRIST_SELF_MANAGED: yesNo,
    GRIST_SELF_MANAGED_HOME: nonEmpty.url('must be an absolute url'),
    GRIST_SELF_MANAGED_SINGLE_ORG: yesNo,
    GRIST_SERVER_PROTOCOL: nonEmpty,
    GRIST_TEAM_SITE: nonEmpty,
    GRIST_WORKSPACE_ID: nonEmpty.regex(/^\s*[+-]?\d+\s*$/, 'must be an integer'),
  })
  .catchall(nonEmpty)

const configFileSchema = z.record(z.string())

/**
 * Default location of the persisted settings file
 */
export function getDefaultConfigPath(): string {
  return join(homedir(), '.gristapi', 'config.json')
}

/**
 * Obfuscate the secret API key for output printing
 */
export function maskApiKey(apiKey: string): string {
  const length = apiKey.length
  return length < 5 ? apiKey : `${apiKey.slice(0, 2)}<${length - 4}>${apiKey.slice(-2)}`
}

/**
 * Format a configuration for output printing, with the API key masked
 */
export function formatConfig(config: Record<string, string>, multiline = false): string {
  if (Object.keys(config).length === 0) {
    return '{<empty>}'
  }

  const copy = { ...config, GRIST_API_KEY: maskApiKey(config.GRIST_API_KEY ?? '') }
  return multiline ? JSON.stringify(copy, null, 2) : JSON.stringify(copy)
}

/**
 * A copy of a config layer safe to log
 */
function maskLayer(layer: Record<string, string>): Record<string, string> {
  return layer.GRIST_API_KEY === undefined ? layer : { ...layer, GRIST_API_KEY: maskApiKey(layer.GRIST_API_KEY) }
}

function validateSnapshot(snapshot: Record<string, string>, source: string): void {
  const result = snapshotSchema.safeParse(snapshot)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')} ${issue.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration (${source}): ${issues}\n${formatConfig(snapshot, true)}`)
  }
}

function validateOverrides(overrides: ConfigOverrides): void {
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value !== 'string' || value === '') {
      throw new ConfigurationError(`Override for ${key} must be a non-empty string`)
    }
  }
}

/**
 * Read a flat JSON object of key→string; a missing file is an empty layer
 */
export function readConfigFile(filePath: string): ConfigOverrides {
  if (!existsSync(filePath)) {
    return {}
  }

  logger.fileOp('read', filePath)

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot parse config file ${filePath}: ${reason}`, { cause: error })
  }

  const result = configFileSchema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigurationError(`Config file ${filePath} must be a flat JSON object of strings`)
  }

  return result.data
}

export interface ConfiguratorOptions {
  /** Settings file to read, defaults to ~/.gristapi/config.json */
  configPath?: string
  /** Environment to read, defaults to process.env */
  env?: NodeJS.ProcessEnv
}

/**
 * Owns the configuration snapshot for one client
 */
export class Configurator {
  readonly config: ConfigSnapshot
  protected readonly configPath: string
  protected readonly env: NodeJS.ProcessEnv
  private overrides: ConfigOverrides = {}

  constructor(overrides?: ConfigOverrides, options: ConfiguratorOptions = {}) {
    this.configPath = options.configPath ?? getDefaultConfigPath()
    this.env = options.env ?? process.env
    this.config = { ...DEFAULT_CONFIG }
    this.rebuild(overrides)
  }

  get docId(): string {
    return this.config.GRIST_DOC_ID
  }

  get raiseOnError(): boolean {
    return this.config.GRIST_RAISE_ERROR === 'Y'
  }

  get safeMode(): boolean {
    return this.config.GRIST_SAFEMODE === 'Y'
  }

  get workspaceId(): number {
    return Number.parseInt(this.config.GRIST_WORKSPACE_ID, 10)
  }

  /**
   * The overrides currently applied on top of the static layers
   */
  getOverrides(): ConfigOverrides {
    return { ...this.overrides }
  }

  /**
   * Defaults + files + env, ignoring in-process overrides
   */
  getStatic(): ConfigSnapshot {
    const snapshot = this.readStatic()
    validateSnapshot(snapshot, 'static')
    return snapshot
  }

  /**
   * Merge overrides onto the current snapshot without re-reading sources
   */
  patch(overrides: ConfigOverrides): void {
    validateOverrides(overrides)
    validateSnapshot({ ...this.config, ...overrides }, 'patch')
    logger.configResolution('patch', maskLayer(overrides))
    this.overrides = { ...this.overrides, ...overrides }
    Object.assign(this.config, overrides)
  }

  /**
   * Discard previous overrides, re-read every source, then apply overrides
   */
  rebuild(overrides: ConfigOverrides = {}): void {
    validateOverrides(overrides)
    const next: ConfigSnapshot = { ...this.readStatic(), ...overrides }
    logger.configResolution('overrides', maskLayer(overrides))
    validateSnapshot(next, 'rebuild')

    for (const key of Object.keys(this.config)) {
      if (!(key in next)) delete this.config[key]
    }

    Object.assign(this.config, next)
    this.overrides = { ...overrides }
  }

  /**
   * A caller-owned copy of the snapshot in effect
   */
  resolve(): ConfigSnapshot {
    return { ...this.config }
  }

  /**
   * Base url for API calls, optionally targeting another team site
   */
  serverUrl(teamId = ''): string {
    const config = this.config
    const team = teamId || config.GRIST_TEAM_SITE
    if (config.GRIST_SELF_MANAGED !== 'Y') {
      return `${config.GRIST_SERVER_PROTOCOL}${team}.${config.GRIST_API_SERVER}/${config.GRIST_API_ROOT}`
    }

    const home = config.GRIST_SELF_MANAGED_HOME.replace(/\/+$/, '')
    if (config.GRIST_SELF_MANAGED_SINGLE_ORG === 'Y') {
      return `${home}/api`
    }

    return `${home}/o/${team}/api`
  }

  /**
   * Built-in defaults; subclasses may add extension keys here
   */
  protected defaults(): ConfigSnapshot {
    return { ...DEFAULT_CONFIG }
  }

  /**
   * Settings files in increasing precedence
   */
  protected configFiles(): string[] {
    return [this.configPath]
  }

  /**
   * Assemble the static layers. Env vars are read for every key known
   * after the file layers.
   */
  protected readStatic(): ConfigSnapshot {
    const config = this.defaults()
    logger.configResolution('defaults', maskLayer(config))

    for (const filePath of this.configFiles()) {
      const layer = readConfigFile(filePath)
      logger.configResolution(filePath, maskLayer(layer))
      Object.assign(config, layer)
    }

    for (const key of Object.keys(config)) {
      const value = this.env[key]
      if (value !== undefined) {
        logger.configResolution(`env ${key}`, key === 'GRIST_API_KEY' ? maskApiKey(value) : value)
        config[key] = value
      }
    }

    return config
  }
}
