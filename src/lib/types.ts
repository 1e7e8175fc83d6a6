/**
 * Shared type definitions for grist-cli
 */

// Access roles, from most to least privileged
export type GristRole = 'editors' | 'members' | 'owners' | 'viewers'

// Role assigned in an access delta; null removes the user
export type AccessDelta = Record<string, GristRole | null>

// Maximum role inherited by a document or workspace from its parent
export type MaxInheritedRole = GristRole | null

export interface GristAccessUser {
  access: GristRole | null
  email: string
  id: number
  name: string
  parentAccess?: GristRole | null
  [key: string]: unknown
}

export interface GristAccessList {
  maxInheritedRole?: MaxInheritedRole
  users: GristAccessUser[]
}

export interface GristTeam {
  access?: GristRole
  createdAt?: string
  domain: string
  id: number
  name: string
  owner?: { id: number; name: string } | null
  updatedAt?: string
}

export interface GristDoc {
  access?: GristRole
  createdAt?: string
  id: string
  isPinned: boolean
  name: string
  updatedAt?: string
  urlId?: string | null
  workspace?: GristWorkspace
}

export interface GristWorkspace {
  access?: GristRole
  docs?: GristDoc[]
  id: number
  name: string
  org?: GristTeam
  owner?: { email?: string; id: number; name: string } | null
}

// Flattened record: id plus field values
export type GristRecord = { id: number } & Record<string, unknown>

// Record fields as written (no id)
export type GristFields = Record<string, unknown>

// Upsert item: lookup fields in `require`, values to set in `fields`
export interface GristUpsert {
  fields?: GristFields
  require: GristFields
}

export interface GristTable {
  fields: Record<string, unknown>
  id: string
}

// Table creation payload
export interface GristTableSpec {
  columns: GristColumn[]
  id: string
}

export interface GristColumn {
  fields: {
    label?: string
    type?: string
    // Objects are json-encoded before sending
    widgetOptions?: Record<string, unknown> | string
    [key: string]: unknown
  }
  id: string
}

export interface GristAttachment {
  fields: {
    fileName: string
    fileSize: number
    timeUploaded: string
    [key: string]: unknown
  }
  id: number
}

export type AttachmentStoreType = 'external' | 'internal'

export interface GristWebhookFields {
  enabled?: boolean
  eventTypes?: string[]
  isReadyColumn?: string | null
  memo?: string
  name?: string
  tableId?: string
  url?: string
}

export interface GristWebhook {
  fields: GristWebhookFields & Record<string, unknown>
  id: string
  usage?: Record<string, unknown> | null
}

// SCIM user resource, kept loose: the service adds schema-specific keys
export interface ScimUser {
  active?: boolean
  displayName?: string
  emails?: { primary?: boolean; value: string }[]
  id: string
  name?: { formatted?: string }
  userName: string
  [key: string]: unknown
}

export interface ScimListResponse<T = ScimUser> {
  itemsPerPage?: number
  Resources: T[]
  schemas?: string[]
  startIndex?: number
  totalResults: number
}

export interface GristServiceAccount {
  description?: string
  endOfLife?: string
  hasValidKey?: boolean
  id: number
  key?: string
  label?: string
  login?: string
  [key: string]: unknown
}

export interface GristSqlResult {
  fields: Record<string, unknown>
}
