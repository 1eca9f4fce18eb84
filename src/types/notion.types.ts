export const NOTION_PROPERTY_TYPES = [
  'title',
  'rich_text',
  'select',
  'multi_select',
  'number',
  'checkbox',
  'date',
  'url',
  'email',
  'phone_number',
  'status',
  'files',
] as const

export type NotionPropertyType = (typeof NOTION_PROPERTY_TYPES)[number]

export const isNotionPropertyType = (
  value: string,
): value is NotionPropertyType =>
  (NOTION_PROPERTY_TYPES as readonly string[]).includes(value)

export type PropertyInput =
  | string
  | number
  | boolean
  | Date
  | Array<string | number>

interface RichTextItem {
  type?: 'text'
  text: { content: string }
  plain_text?: string
}

export interface ExternalFile {
  type: 'external'
  name: string
  external: { url: string }
}

/** Property payload in the shape the pages API expects */
export type NotionPropertyValue =
  | { title: RichTextItem[] }
  | { rich_text: RichTextItem[] }
  | { select: { name: string } }
  | { multi_select: Array<{ name: string }> }
  | { number: number }
  | { checkbox: boolean }
  | { date: { start: string } }
  | { url: string }
  | { email: string }
  | { phone_number: string }
  | { status: { name: string } }
  | { files: ExternalFile[] }

export type NotionProperties = Record<string, NotionPropertyValue>

/**
 * Database filter. Property clauses keep the pages API shape, e.g.
 * `{ property: 'Date', date: { before: '2024-12-03' } }`.
 */
export type NotionFilter =
  | { and: NotionFilter[] }
  | { or: NotionFilter[] }
  | ({ property: string } & Record<string, unknown>)

export interface NotionSort {
  property?: string
  timestamp?: 'created_time' | 'last_edited_time'
  direction: 'ascending' | 'descending'
}

export interface NotionPage {
  object: 'page'
  id: string
  archived?: boolean
  created_time?: string
  last_edited_time?: string
  properties: Record<string, unknown>
}

export interface NotionPaginatedList<T> {
  object: 'list'
  results: T[]
  has_more: boolean
  next_cursor: string | null
}

export interface NotionBlock {
  object: 'block'
  id: string
  type: string
  child_database?: { title: string }
}

export interface NotionDatabase {
  object: 'database'
  id: string
  title?: RichTextItem[]
  properties: Record<string, { id: string; name?: string; type: string }>
}

export interface NotionDatabaseRef {
  id: string
  title: string
}

export interface QueryOptions {
  filter?: NotionFilter
  sorts?: NotionSort[]
  startCursor?: string
  pageSize?: number
}

export type DuplicateMatchPolicy = 'update-first' | 'update-all' | 'error'

export interface NotionClientConfig {
  token: string
  baseUrl?: string
  apiVersion?: string
  maxConcurrent: number
  minRequestIntervalMs: number
  maxRetries: number
  /** Base delay for exponential backoff when no Retry-After is given */
  retryBaseDelayMs?: number
  duplicateMatchPolicy: DuplicateMatchPolicy
}

export interface UpsertResult {
  id: string
  action: 'created' | 'updated'
  /** Number of rows the match filter returned */
  matched: number
}
