/**
 * Configurator used by the command line
 *
 * Adds a `gristconf.json` layer from the current directory and the
 * `GRIST_CLI_TIMEOUT` key. Commands check statuses themselves, so raising
 * on error and safe mode are always off.
 */

import { join } from 'node:path'

import type { ConfigOverrides, ConfigSnapshot } from './config.js'

import { Configurator } from './config.js'
import { ConfigurationError } from './errors.js'

export const LOCAL_CONFIG_FILE = 'gristconf.json'
export const DEFAULT_CLI_TIMEOUT = '60'

export class CliConfigurator extends Configurator {
  /**
   * Request timeout in seconds
   */
  get timeout(): number {
    const raw = this.config.GRIST_CLI_TIMEOUT
    const timeout = Number(raw)
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigurationError(`GRIST_CLI_TIMEOUT must be a positive number of seconds, got "${raw}"`)
    }

    return timeout
  }

  patch(_overrides: ConfigOverrides): void {
    throw new ConfigurationError('The command line configuration cannot be patched at runtime')
  }

  protected configFiles(): string[] {
    return [...super.configFiles(), join(process.cwd(), LOCAL_CONFIG_FILE)]
  }

  protected defaults(): ConfigSnapshot {
    return { ...super.defaults(), GRIST_CLI_TIMEOUT: DEFAULT_CLI_TIMEOUT }
  }

  protected readStatic(): ConfigSnapshot {
    const config = super.readStatic()
    config.GRIST_RAISE_ERROR = 'N'
    config.GRIST_SAFEMODE = 'N'
    return config
  }
}
