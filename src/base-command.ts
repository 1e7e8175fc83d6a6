import {Command, Flags} from '@oclif/core'
import {existsSync, statSync} from 'node:fs'
import {dirname, resolve} from 'node:path'

import type {ApiResult} from './lib/api/request.js'
import type {OutputLevel} from './lib/cli-output.js'
import type {GristAccessUser} from './lib/types.js'

import {GristApi} from './lib/api/index.js'
import {CliConfigurator} from './lib/cli-config.js'
import {
  ACCESS_CHOICES,
  EXIT_BAD_INVOCATION,
  EXIT_BAD_STATUS,
  InvocationError,
  renderOutput,
  transportStatus,
} from './lib/cli-output.js'
import {loadConverterModule} from './lib/converters.js'
import {TransportError} from './lib/errors.js'
import {formatErrorResponse, formatTable} from './lib/format.js'
import {logger, resolveVerbosity} from './lib/logger.js'

// Shared selectors; an empty value or 0 means the configured default
export const teamFlag = Flags.string({
  char: 't',
  default: '',
  description: 'Team site [default: current]',
})

export const workspaceFlag = Flags.integer({
  char: 'w',
  default: 0,
  description: 'Workspace id [default: current]',
})

export const docFlag = Flags.string({
  char: 'd',
  default: '',
  description: 'Document id [default: current]',
})

export const tableFlag = Flags.string({
  char: 'b',
  description: 'Table id',
  required: true,
})

export const accessFlag = Flags.option({
  char: 'a',
  description: 'Access level to grant, none to revoke',
  options: ACCESS_CHOICES,
  required: true,
})()

interface BaseFlagValues {
  inspect: boolean
  'log-level'?: number
  quiet: boolean
  verbose: number
}

export default abstract class BaseCommand extends Command {
  static baseFlags = {
    inspect: Flags.boolean({
      char: 'i',
      default: false,
      description: 'Print the last request and response before the output',
    }),
    'log-level': Flags.integer({
      description: 'Diagnostics on stderr, -1 (silent) to 3 (trace)',
      max: 3,
      min: -1,
    }),
    quiet: Flags.boolean({
      char: 'q',
      default: false,
      description: 'Print nothing, only set the exit code',
    }),
    verbose: Flags.integer({
      char: 'v',
      default: 0,
      description: 'Output level: 0 text, 1 payload as JSON, 2 raw response',
      max: 2,
      min: 0,
    }),
  }

  private client?: GristApi
  private inspected = false
  private level: OutputLevel = 0
  private quiet = false
  private showInspect = false

  protected get api(): GristApi {
    if (!this.client) {
      throw new Error('The command did not connect to the API')
    }

    return this.client
  }

  protected get styled(): boolean {
    return Boolean(process.stdout.isTTY)
  }

  protected async catch(error: Error & {exitCode?: number}): Promise<unknown> {
    if (error instanceof TransportError) {
      this.printInspect()
      if (!this.quiet) {
        this.log(formatErrorResponse(transportStatus(error.kind), error.message, {styled: this.styled}))
      }

      this.exit(EXIT_BAD_STATUS)
    }

    if (error instanceof InvocationError) {
      this.error(error.message, {exit: EXIT_BAD_INVOCATION})
    }

    return super.catch(error)
  }

  /**
   * Apply the base flags and build a client from the layered configuration
   * and the converters module of the current directory
   */
  protected async connect(flags: BaseFlagValues): Promise<GristApi> {
    logger.setLevel(resolveVerbosity(flags['log-level']))
    this.level = flags.verbose >= 2 ? 2 : flags.verbose === 1 ? 1 : 0
    this.quiet = flags.quiet
    this.showInspect = flags.inspect

    const configurator = new CliConfigurator()
    const {inConverters, outConverters} = await loadConverterModule(process.cwd())
    this.client = new GristApi({
      configurator,
      inConverter: inConverters,
      outConverter: outConverters,
      requestOptions: {timeout: configurator.timeout},
    })
    return this.client
  }

  /**
   * For commands whose payload is not worth printing, such as downloads
   */
  protected forceTextOutput(): void {
    this.level = 0
  }

  /**
   * Report a bad status and leave with exit code 3
   */
  protected exitIfError([status, payload]: ApiResult<unknown>): void {
    this.printInspect()
    if (this.api.ok) return

    if (!this.quiet) {
      this.log(
        this.level < 2
          ? formatErrorResponse(status, payload, {styled: this.styled})
          : (this.api.caller.responseAsJson() ?? 'null')
      )
    }

    this.exit(EXIT_BAD_STATUS)
  }

  /**
   * Email of a user already on an access list, the key access deltas use
   */
  protected findUserEmail(users: GristAccessUser[], userId: number): string {
    const user = users.find(candidate => candidate.id === userId)
    if (!user) {
      this.printInspect()
      throw new InvocationError(`User id ${userId} not found`)
    }

    return user.email
  }

  protected checkDownloadPath(filePath: string): string {
    const target = resolve(filePath)
    if (!existsSync(dirname(target)) || !statSync(dirname(target)).isDirectory()) {
      throw new InvocationError(`Path does not exist: ${filePath}`)
    }

    return target
  }

  protected checkUploadPath(filePath: string): string {
    const source = resolve(filePath)
    if (!existsSync(source) || !statSync(source).isFile()) {
      throw new InvocationError(`File does not exist: ${filePath}`)
    }

    return source
  }

  protected formatUsers(users: GristAccessUser[]): string {
    const rows = users.map(user => [user.id, user.name, user.email, String(user.access)])
    return formatTable(['id', 'name', 'email', 'access'], rows, {styled: this.styled})
  }

  protected printDoneAndId(result: ApiResult<unknown>, id: unknown): void {
    this.exitIfError(result)
    this.printOutput(`Done. Id: ${id}`, result[1])
  }

  protected printDoneOrExit(result: ApiResult<unknown>): void {
    this.exitIfError(result)
    this.printOutput('Done.', result[1])
  }

  protected printOutput(content: string, payload: unknown): void {
    this.printInspect()
    if (this.quiet) return
    this.log(renderOutput(this.level, content, payload, this.api.caller.responseAsJson()))
  }

  private printInspect(): void {
    if (!this.showInspect || this.inspected || this.quiet || !this.client) return
    this.inspected = true
    this.log(this.client.inspect())
    this.log('-'.repeat(40))
  }
}
