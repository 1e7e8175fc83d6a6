/**
 * Grist REST API client
 * Main entry point that composes all API modules
 */

import type { ConfigOverrides } from '../config.js'
import type { ConverterRegistry } from '../converters.js'
import type { ConverterSet } from './base.js'
import type { FetchLike, RequestOptions, TransactionRecord } from './request.js'

import { Configurator } from '../config.js'
import { ConfigurationError } from '../errors.js'
import { AttachmentsApi } from './attachments.js'
import { DocsApi } from './docs.js'
import { RecordsApi } from './records.js'
import { ApiCaller } from './request.js'
import { ServiceAccountsApi } from './service-accounts.js'
import { SqlApi } from './sql.js'
import { TablesApi } from './tables.js'
import { TeamsApi } from './teams.js'
import { UsersApi } from './users.js'
import { WebhooksApi } from './webhooks.js'
import { WorkspacesApi } from './workspaces.js'

export interface GristApiOptions {
  /** Ready-made engine; its configurator is shared */
  caller?: ApiCaller
  /** Overrides applied on top of defaults, config file and env */
  config?: ConfigOverrides
  configurator?: Configurator
  /** Used when the engine is built here */
  fetch?: FetchLike
  inConverter?: ConverterRegistry
  outConverter?: ConverterRegistry
  /** Used when the engine is built here */
  requestOptions?: RequestOptions
}

/**
 * Grist API client class - facade that composes all domain APIs.
 * The configurator and the engine are fixed at construction and share one
 * configuration snapshot.
 */
export class GristApi {
  readonly caller: ApiCaller
  readonly configurator: Configurator

  // Domain API instances (internal use)
  private readonly attachmentsApi: AttachmentsApi
  private readonly converters: ConverterSet
  private readonly docsApi: DocsApi
  private readonly recordsApi: RecordsApi
  private readonly serviceAccountsApi: ServiceAccountsApi
  private readonly sqlApi: SqlApi
  private readonly tablesApi: TablesApi
  private readonly teamsApi: TeamsApi
  private readonly usersApi: UsersApi
  private readonly webhooksApi: WebhooksApi
  private readonly workspacesApi: WorkspacesApi

  constructor(options: GristApiOptions = {}) {
    const sources = [options.config, options.configurator, options.caller].filter(source => source !== undefined)
    if (sources.length > 1) {
      throw new ConfigurationError('Pass at most one of "config", "configurator" and "caller"')
    }

    if (options.caller) {
      this.caller = options.caller
      this.configurator = options.caller.configurator
    } else {
      this.configurator = options.configurator ?? new Configurator(options.config)
      this.caller = new ApiCaller(this.configurator, { fetch: options.fetch, requestOptions: options.requestOptions })
    }

    this.converters = {
      inConverters: options.inConverter ?? {},
      outConverters: options.outConverter ?? {},
    }

    // Initialize domain APIs
    this.attachmentsApi = new AttachmentsApi(this.caller, this.converters)
    this.docsApi = new DocsApi(this.caller, this.converters)
    this.recordsApi = new RecordsApi(this.caller, this.converters)
    this.serviceAccountsApi = new ServiceAccountsApi(this.caller, this.converters)
    this.sqlApi = new SqlApi(this.caller, this.converters)
    this.tablesApi = new TablesApi(this.caller, this.converters)
    this.teamsApi = new TeamsApi(this.caller, this.converters)
    this.usersApi = new UsersApi(this.caller, this.converters)
    this.webhooksApi = new WebhooksApi(this.caller, this.converters)
    this.workspacesApi = new WorkspacesApi(this.caller, this.converters)
  }

  get apiCalls(): number {
    return this.caller.apiCalls
  }

  get dryRun(): boolean {
    return this.caller.dryRun
  }

  set dryRun(value: boolean) {
    this.caller.dryRun = value
  }

  /**
   * Input converters, table id → column id → function
   */
  get inConverter(): ConverterRegistry {
    return this.converters.inConverters
  }

  set inConverter(registry: ConverterRegistry) {
    this.converters.inConverters = registry
  }

  /**
   * True iff the last call got a real response with a successful status
   */
  get ok(): boolean {
    return this.caller.ok
  }

  get outConverter(): ConverterRegistry {
    return this.converters.outConverters
  }

  set outConverter(registry: ConverterRegistry) {
    this.converters.outConverters = registry
  }

  get transaction(): Readonly<TransactionRecord> {
    return this.caller.transaction
  }

  closeSession(): void {
    this.caller.closeSession()
  }

  inspect(sep?: string, maxContent?: number): string {
    return this.caller.inspect(sep, maxContent)
  }

  openSession(): void {
    this.caller.openSession()
  }

  /**
   * Re-read every configuration source, then apply `config`
   */
  reconfig(config?: ConfigOverrides): void {
    this.configurator.rebuild(config)
  }

  /**
   * Apply `config` on top of the configuration in effect
   */
  updateConfig(config: ConfigOverrides): void {
    this.configurator.patch(config)
  }

  // ========== Users (SCIM) ==========

  addUser(...args: Parameters<UsersApi['addUser']>): ReturnType<UsersApi['addUser']> {
    return this.usersApi.addUser(...args)
  }

  deleteUser(...args: Parameters<UsersApi['deleteUser']>): ReturnType<UsersApi['deleteUser']> {
    return this.usersApi.deleteUser(...args)
  }

  listUsers(...args: Parameters<UsersApi['listUsers']>): ReturnType<UsersApi['listUsers']> {
    return this.usersApi.listUsers(...args)
  }

  listUsersRaw(...args: Parameters<UsersApi['listUsersRaw']>): ReturnType<UsersApi['listUsersRaw']> {
    return this.usersApi.listUsersRaw(...args)
  }

  searchUsers(...args: Parameters<UsersApi['searchUsers']>): ReturnType<UsersApi['searchUsers']> {
    return this.usersApi.searchUsers(...args)
  }

  searchUsersRaw(...args: Parameters<UsersApi['searchUsersRaw']>): ReturnType<UsersApi['searchUsersRaw']> {
    return this.usersApi.searchUsersRaw(...args)
  }

  seeMyself(...args: Parameters<UsersApi['seeMyself']>): ReturnType<UsersApi['seeMyself']> {
    return this.usersApi.seeMyself(...args)
  }

  seeScimConfig(...args: Parameters<UsersApi['seeScimConfig']>): ReturnType<UsersApi['seeScimConfig']> {
    return this.usersApi.seeScimConfig(...args)
  }

  seeScimResources(...args: Parameters<UsersApi['seeScimResources']>): ReturnType<UsersApi['seeScimResources']> {
    return this.usersApi.seeScimResources(...args)
  }

  seeScimSchemas(...args: Parameters<UsersApi['seeScimSchemas']>): ReturnType<UsersApi['seeScimSchemas']> {
    return this.usersApi.seeScimSchemas(...args)
  }

  seeUser(...args: Parameters<UsersApi['seeUser']>): ReturnType<UsersApi['seeUser']> {
    return this.usersApi.seeUser(...args)
  }

  updateUser(...args: Parameters<UsersApi['updateUser']>): ReturnType<UsersApi['updateUser']> {
    return this.usersApi.updateUser(...args)
  }

  // ========== Service accounts ==========

  addServiceAccount(...args: Parameters<ServiceAccountsApi['addServiceAccount']>): ReturnType<ServiceAccountsApi['addServiceAccount']> {
    return this.serviceAccountsApi.addServiceAccount(...args)
  }

  deleteServiceAccount(...args: Parameters<ServiceAccountsApi['deleteServiceAccount']>): ReturnType<ServiceAccountsApi['deleteServiceAccount']> {
    return this.serviceAccountsApi.deleteServiceAccount(...args)
  }

  deleteServiceAccountKey(...args: Parameters<ServiceAccountsApi['deleteServiceAccountKey']>): ReturnType<ServiceAccountsApi['deleteServiceAccountKey']> {
    return this.serviceAccountsApi.deleteServiceAccountKey(...args)
  }

  listServiceAccounts(...args: Parameters<ServiceAccountsApi['listServiceAccounts']>): ReturnType<ServiceAccountsApi['listServiceAccounts']> {
    return this.serviceAccountsApi.listServiceAccounts(...args)
  }

  renewServiceAccountKey(...args: Parameters<ServiceAccountsApi['renewServiceAccountKey']>): ReturnType<ServiceAccountsApi['renewServiceAccountKey']> {
    return this.serviceAccountsApi.renewServiceAccountKey(...args)
  }

  seeServiceAccount(...args: Parameters<ServiceAccountsApi['seeServiceAccount']>): ReturnType<ServiceAccountsApi['seeServiceAccount']> {
    return this.serviceAccountsApi.seeServiceAccount(...args)
  }

  updateServiceAccount(...args: Parameters<ServiceAccountsApi['updateServiceAccount']>): ReturnType<ServiceAccountsApi['updateServiceAccount']> {
    return this.serviceAccountsApi.updateServiceAccount(...args)
  }

  // ========== Team sites ==========

  deleteTeam(...args: Parameters<TeamsApi['deleteTeam']>): ReturnType<TeamsApi['deleteTeam']> {
    return this.teamsApi.deleteTeam(...args)
  }

  listTeamSites(): ReturnType<TeamsApi['listTeamSites']> {
    return this.teamsApi.listTeamSites()
  }

  listTeamUsers(...args: Parameters<TeamsApi['listTeamUsers']>): ReturnType<TeamsApi['listTeamUsers']> {
    return this.teamsApi.listTeamUsers(...args)
  }

  seeTeam(...args: Parameters<TeamsApi['seeTeam']>): ReturnType<TeamsApi['seeTeam']> {
    return this.teamsApi.seeTeam(...args)
  }

  seeTeamUsage(...args: Parameters<TeamsApi['seeTeamUsage']>): ReturnType<TeamsApi['seeTeamUsage']> {
    return this.teamsApi.seeTeamUsage(...args)
  }

  updateTeam(...args: Parameters<TeamsApi['updateTeam']>): ReturnType<TeamsApi['updateTeam']> {
    return this.teamsApi.updateTeam(...args)
  }

  updateTeamUsers(...args: Parameters<TeamsApi['updateTeamUsers']>): ReturnType<TeamsApi['updateTeamUsers']> {
    return this.teamsApi.updateTeamUsers(...args)
  }

  // ========== Workspaces ==========

  addWorkspace(...args: Parameters<WorkspacesApi['addWorkspace']>): ReturnType<WorkspacesApi['addWorkspace']> {
    return this.workspacesApi.addWorkspace(...args)
  }

  deleteWorkspace(...args: Parameters<WorkspacesApi['deleteWorkspace']>): ReturnType<WorkspacesApi['deleteWorkspace']> {
    return this.workspacesApi.deleteWorkspace(...args)
  }

  listWorkspaces(...args: Parameters<WorkspacesApi['listWorkspaces']>): ReturnType<WorkspacesApi['listWorkspaces']> {
    return this.workspacesApi.listWorkspaces(...args)
  }

  listWorkspaceUsers(...args: Parameters<WorkspacesApi['listWorkspaceUsers']>): ReturnType<WorkspacesApi['listWorkspaceUsers']> {
    return this.workspacesApi.listWorkspaceUsers(...args)
  }

  seeWorkspace(...args: Parameters<WorkspacesApi['seeWorkspace']>): ReturnType<WorkspacesApi['seeWorkspace']> {
    return this.workspacesApi.seeWorkspace(...args)
  }

  updateWorkspace(...args: Parameters<WorkspacesApi['updateWorkspace']>): ReturnType<WorkspacesApi['updateWorkspace']> {
    return this.workspacesApi.updateWorkspace(...args)
  }

  updateWorkspaceUsers(...args: Parameters<WorkspacesApi['updateWorkspaceUsers']>): ReturnType<WorkspacesApi['updateWorkspaceUsers']> {
    return this.workspacesApi.updateWorkspaceUsers(...args)
  }

  // ========== Documents ==========

  addDoc(...args: Parameters<DocsApi['addDoc']>): ReturnType<DocsApi['addDoc']> {
    return this.docsApi.addDoc(...args)
  }

  copyDoc(...args: Parameters<DocsApi['copyDoc']>): ReturnType<DocsApi['copyDoc']> {
    return this.docsApi.copyDoc(...args)
  }

  deleteDoc(...args: Parameters<DocsApi['deleteDoc']>): ReturnType<DocsApi['deleteDoc']> {
    return this.docsApi.deleteDoc(...args)
  }

  deleteDocHistory(...args: Parameters<DocsApi['deleteDocHistory']>): ReturnType<DocsApi['deleteDocHistory']> {
    return this.docsApi.deleteDocHistory(...args)
  }

  downloadCsv(...args: Parameters<DocsApi['downloadCsv']>): ReturnType<DocsApi['downloadCsv']> {
    return this.docsApi.downloadCsv(...args)
  }

  downloadExcel(...args: Parameters<DocsApi['downloadExcel']>): ReturnType<DocsApi['downloadExcel']> {
    return this.docsApi.downloadExcel(...args)
  }

  downloadSchema(...args: Parameters<DocsApi['downloadSchema']>): ReturnType<DocsApi['downloadSchema']> {
    return this.docsApi.downloadSchema(...args)
  }

  downloadSqlite(...args: Parameters<DocsApi['downloadSqlite']>): ReturnType<DocsApi['downloadSqlite']> {
    return this.docsApi.downloadSqlite(...args)
  }

  listDocUsers(...args: Parameters<DocsApi['listDocUsers']>): ReturnType<DocsApi['listDocUsers']> {
    return this.docsApi.listDocUsers(...args)
  }

  moveDoc(...args: Parameters<DocsApi['moveDoc']>): ReturnType<DocsApi['moveDoc']> {
    return this.docsApi.moveDoc(...args)
  }

  reloadDoc(...args: Parameters<DocsApi['reloadDoc']>): ReturnType<DocsApi['reloadDoc']> {
    return this.docsApi.reloadDoc(...args)
  }

  seeDoc(...args: Parameters<DocsApi['seeDoc']>): ReturnType<DocsApi['seeDoc']> {
    return this.docsApi.seeDoc(...args)
  }

  updateDoc(...args: Parameters<DocsApi['updateDoc']>): ReturnType<DocsApi['updateDoc']> {
    return this.docsApi.updateDoc(...args)
  }

  updateDocUsers(...args: Parameters<DocsApi['updateDocUsers']>): ReturnType<DocsApi['updateDocUsers']> {
    return this.docsApi.updateDocUsers(...args)
  }

  // ========== Records ==========

  addRecords(...args: Parameters<RecordsApi['addRecords']>): ReturnType<RecordsApi['addRecords']> {
    return this.recordsApi.addRecords(...args)
  }

  addUpdateRecords(...args: Parameters<RecordsApi['addUpdateRecords']>): ReturnType<RecordsApi['addUpdateRecords']> {
    return this.recordsApi.addUpdateRecords(...args)
  }

  deleteRows(...args: Parameters<RecordsApi['deleteRows']>): ReturnType<RecordsApi['deleteRows']> {
    return this.recordsApi.deleteRows(...args)
  }

  listRecords(...args: Parameters<RecordsApi['listRecords']>): ReturnType<RecordsApi['listRecords']> {
    return this.recordsApi.listRecords(...args)
  }

  updateRecords(...args: Parameters<RecordsApi['updateRecords']>): ReturnType<RecordsApi['updateRecords']> {
    return this.recordsApi.updateRecords(...args)
  }

  // ========== Tables and columns ==========

  addCols(...args: Parameters<TablesApi['addCols']>): ReturnType<TablesApi['addCols']> {
    return this.tablesApi.addCols(...args)
  }

  addTables(...args: Parameters<TablesApi['addTables']>): ReturnType<TablesApi['addTables']> {
    return this.tablesApi.addTables(...args)
  }

  addUpdateCols(...args: Parameters<TablesApi['addUpdateCols']>): ReturnType<TablesApi['addUpdateCols']> {
    return this.tablesApi.addUpdateCols(...args)
  }

  deleteColumn(...args: Parameters<TablesApi['deleteColumn']>): ReturnType<TablesApi['deleteColumn']> {
    return this.tablesApi.deleteColumn(...args)
  }

  listCols(...args: Parameters<TablesApi['listCols']>): ReturnType<TablesApi['listCols']> {
    return this.tablesApi.listCols(...args)
  }

  listTables(...args: Parameters<TablesApi['listTables']>): ReturnType<TablesApi['listTables']> {
    return this.tablesApi.listTables(...args)
  }

  updateCols(...args: Parameters<TablesApi['updateCols']>): ReturnType<TablesApi['updateCols']> {
    return this.tablesApi.updateCols(...args)
  }

  updateTables(...args: Parameters<TablesApi['updateTables']>): ReturnType<TablesApi['updateTables']> {
    return this.tablesApi.updateTables(...args)
  }

  // ========== Attachments ==========

  downloadAttachment(...args: Parameters<AttachmentsApi['downloadAttachment']>): ReturnType<AttachmentsApi['downloadAttachment']> {
    return this.attachmentsApi.downloadAttachment(...args)
  }

  downloadAttachments(...args: Parameters<AttachmentsApi['downloadAttachments']>): ReturnType<AttachmentsApi['downloadAttachments']> {
    return this.attachmentsApi.downloadAttachments(...args)
  }

  listAttachments(...args: Parameters<AttachmentsApi['listAttachments']>): ReturnType<AttachmentsApi['listAttachments']> {
    return this.attachmentsApi.listAttachments(...args)
  }

  listStoreSettings(...args: Parameters<AttachmentsApi['listStoreSettings']>): ReturnType<AttachmentsApi['listStoreSettings']> {
    return this.attachmentsApi.listStoreSettings(...args)
  }

  seeAttachment(...args: Parameters<AttachmentsApi['seeAttachment']>): ReturnType<AttachmentsApi['seeAttachment']> {
    return this.attachmentsApi.seeAttachment(...args)
  }

  seeAttachmentStore(...args: Parameters<AttachmentsApi['seeAttachmentStore']>): ReturnType<AttachmentsApi['seeAttachmentStore']> {
    return this.attachmentsApi.seeAttachmentStore(...args)
  }

  seeTransferStatus(...args: Parameters<AttachmentsApi['seeTransferStatus']>): ReturnType<AttachmentsApi['seeTransferStatus']> {
    return this.attachmentsApi.seeTransferStatus(...args)
  }

  transferAttachments(...args: Parameters<AttachmentsApi['transferAttachments']>): ReturnType<AttachmentsApi['transferAttachments']> {
    return this.attachmentsApi.transferAttachments(...args)
  }

  updateAttachmentStore(...args: Parameters<AttachmentsApi['updateAttachmentStore']>): ReturnType<AttachmentsApi['updateAttachmentStore']> {
    return this.attachmentsApi.updateAttachmentStore(...args)
  }

  uploadAttachments(...args: Parameters<AttachmentsApi['uploadAttachments']>): ReturnType<AttachmentsApi['uploadAttachments']> {
    return this.attachmentsApi.uploadAttachments(...args)
  }

  uploadRestoreAttachments(...args: Parameters<AttachmentsApi['uploadRestoreAttachments']>): ReturnType<AttachmentsApi['uploadRestoreAttachments']> {
    return this.attachmentsApi.uploadRestoreAttachments(...args)
  }

  // ========== Webhooks ==========

  addWebhooks(...args: Parameters<WebhooksApi['addWebhooks']>): ReturnType<WebhooksApi['addWebhooks']> {
    return this.webhooksApi.addWebhooks(...args)
  }

  deleteWebhook(...args: Parameters<WebhooksApi['deleteWebhook']>): ReturnType<WebhooksApi['deleteWebhook']> {
    return this.webhooksApi.deleteWebhook(...args)
  }

  emptyPayloadsQueue(...args: Parameters<WebhooksApi['emptyPayloadsQueue']>): ReturnType<WebhooksApi['emptyPayloadsQueue']> {
    return this.webhooksApi.emptyPayloadsQueue(...args)
  }

  listWebhooks(...args: Parameters<WebhooksApi['listWebhooks']>): ReturnType<WebhooksApi['listWebhooks']> {
    return this.webhooksApi.listWebhooks(...args)
  }

  updateWebhook(...args: Parameters<WebhooksApi['updateWebhook']>): ReturnType<WebhooksApi['updateWebhook']> {
    return this.webhooksApi.updateWebhook(...args)
  }

  // ========== SQL ==========

  runSql(...args: Parameters<SqlApi['runSql']>): ReturnType<SqlApi['runSql']> {
    return this.sqlApi.runSql(...args)
  }

  runSqlWithArgs(...args: Parameters<SqlApi['runSqlWithArgs']>): ReturnType<SqlApi['runSqlWithArgs']> {
    return this.sqlApi.runSqlWithArgs(...args)
  }
}

export { ApiCaller } from './request.js'
export type { ApiResult, CallOptions, FetchLike, RequestOptions, TransactionRecord } from './request.js'
export { Pager } from './pager.js'
export type { PagerStep } from './pager.js'
