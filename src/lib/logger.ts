/**
 * Diagnostic verbosity levels, independent of the command output level
 *
 * -1 (silent):  Errors only
 *  0 (normal):  Warnings (default)
 *  1 (verbose): + API calls made, files read/written
 *  2 (debug):   + Request bodies, response payloads
 *  3 (trace):   + Timings, config resolution steps
 */
export type VerbosityLevel = -1 | 0 | 1 | 2 | 3

export const VERBOSITY = {
  DEBUG: 2 as VerbosityLevel,
  NORMAL: 0 as VerbosityLevel,
  SILENT: -1 as VerbosityLevel,
  TRACE: 3 as VerbosityLevel,
  VERBOSE: 1 as VerbosityLevel,
}

interface TimingEntry {
  label: string
  start: number
}

function isVerbosityLevel(value: number): value is VerbosityLevel {
  return Number.isInteger(value) && value >= -1 && value <= 3
}

class Logger {
  private level: VerbosityLevel = VERBOSITY.NORMAL
  private timings: Map<string, TimingEntry> = new Map()

  /**
   * API request being made (level 1+)
   */
  apiCall(method: string, url: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      console.error(`  → ${method} ${url}`)
    }
  }

  /**
   * API response received (level 1+)
   */
  apiResponse(status: number, statusText: string, durationMs?: number): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const timing = durationMs === undefined ? '' : ` (${durationMs}ms)`
      console.error(`  ← ${status} ${statusText}${timing}`)
    }
  }

  /**
   * Config layer applied during resolution (level 3+)
   */
  configResolution(source: string, value: unknown): void {
    if (this.level >= VERBOSITY.TRACE) {
      const preview = this.truncateJson(value, 100)
      console.error(`      ⚙️ Config [${source}]: ${preview}`)
    }
  }

  /**
   * General debug message (level 2+)
   */
  debug(...args: unknown[]): void {
    if (this.level >= VERBOSITY.DEBUG) {
      console.error('    [DEBUG]', ...args)
    }
  }

  /**
   * Request not sent because of dry-run or safe mode (level 1+)
   */
  dryRun(method: string, url: string, reason: 'dry-run' | 'safe-mode'): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      console.error(`  ⊘ ${method} ${url} not sent (${reason})`)
    }
  }

  /**
   * File operation (level 1+)
   */
  fileOp(operation: 'read' | 'write', filePath: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const symbol = operation === 'read' ? '📖' : '💾'
      console.error(`  ${symbol} ${operation}: ${filePath}`)
    }
  }

  getLevel(): VerbosityLevel {
    return this.level
  }

  isEnabled(level: VerbosityLevel): boolean {
    return this.level >= level
  }

  /**
   * Request body being sent (level 2+)
   */
  requestBody(body: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      const preview = this.truncateJson(body, 500)
      console.error(`    Body: ${preview}`)
    }
  }

  /**
   * Response payload received (level 2+)
   */
  responseData(data: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      const preview = this.truncateJson(data, 500)
      console.error(`    Response: ${preview}`)
    }
  }

  setLevel(level: VerbosityLevel): void {
    this.level = level
  }

  /**
   * End timing an operation (level 3+)
   */
  timeEnd(id: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      const entry = this.timings.get(id)
      if (entry) {
        const duration = (performance.now() - entry.start).toFixed(2)
        console.error(`      ⏱ ${entry.label}: ${duration}ms`)
        this.timings.delete(id)
      }
    }
  }

  /**
   * Start timing an operation (level 3+)
   */
  timeStart(id: string, label: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      this.timings.set(id, { label, start: performance.now() })
      console.error(`      ⏱ ${label} started`)
    }
  }

  /**
   * General verbose message (level 1+)
   */
  verbose(...args: unknown[]): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      console.error('  ', ...args)
    }
  }

  /**
   * Warning message (level 0+), goes to stderr
   */
  warn(...args: unknown[]): void {
    if (this.level >= VERBOSITY.NORMAL) {
      console.error('Warning:', ...args)
    }
  }

  private truncateJson(data: unknown, maxLength: number): string {
    try {
      const json = typeof data === 'string' ? data : JSON.stringify(data)
      if (json.length <= maxLength) return json
      return json.slice(0, maxLength) + '...'
    } catch {
      return String(data)
    }
  }
}

// Singleton instance
export const logger = new Logger()

/**
 * Resolve the diagnostic level
 * Priority: silent flag > level flag > env > default
 */
export function resolveVerbosity(
  flagLevel?: number,
  flagSilent?: boolean,
  env: NodeJS.ProcessEnv = process.env
): VerbosityLevel {
  if (flagSilent) {
    return VERBOSITY.SILENT
  }

  if (flagLevel !== undefined) {
    const capped = Math.max(-1, Math.min(flagLevel, 3))
    if (isVerbosityLevel(capped)) return capped
  }

  // GRIST_DEBUG=1 or GRIST_VERBOSE=0|1|2|3
  if (env.GRIST_DEBUG === '1' || env.GRIST_DEBUG === 'true') {
    return VERBOSITY.DEBUG
  }

  if (env.GRIST_VERBOSE) {
    const envLevel = Number.parseInt(env.GRIST_VERBOSE, 10)
    if (isVerbosityLevel(envLevel)) {
      return envLevel
    }
  }

  return VERBOSITY.NORMAL
}
