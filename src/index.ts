/**
 * Library entry point
 */

export { GristApi } from './lib/api/index.js'
export type { GristApiOptions } from './lib/api/index.js'
export { ApiCaller, buildUrl, DRY_RUN_STATUS, isSuccess } from './lib/api/request.js'
export type {
  ApiCallerOptions,
  ApiResult,
  CallOptions,
  FetchLike,
  HttpMethod,
  RequestOptions,
  TransactionRecord,
} from './lib/api/request.js'
export { Pager } from './lib/api/pager.js'
export type { PageData, PagerStep } from './lib/api/pager.js'
export type { ArchiveFormat, ListAttachmentsOptions } from './lib/api/attachments.js'
export type { DownloadHeader } from './lib/api/docs.js'
export type { AddUpdateOptions, ListRecordsOptions } from './lib/api/records.js'
export type { AddUpdateColsOptions } from './lib/api/tables.js'
export type { NewScimUser, ScimOperation, UserSearch } from './lib/api/users.js'
export { Configurator, DEFAULT_CONFIG, formatConfig, getDefaultConfigPath, maskApiKey } from './lib/config.js'
export type { ConfigKey, ConfigOverrides, ConfigSnapshot, ConfiguratorOptions } from './lib/config.js'
export { CliConfigurator } from './lib/cli-config.js'
export { loadConverterModule, SQL_CONVERTER_KEY } from './lib/converters.js'
export type { Converter, ConverterModule, ConverterRegistry } from './lib/converters.js'
export {
  ConfigurationError,
  GristApiError,
  HttpError,
  SafeModeError,
  TransportError,
} from './lib/errors.js'
export type { TransportFailureKind } from './lib/errors.js'
export { logger, resolveVerbosity, VERBOSITY } from './lib/logger.js'
export type * from './lib/types.js'
