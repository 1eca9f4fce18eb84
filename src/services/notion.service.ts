import { formatProperty } from '@services/notion/property-formatter.js'
import { NotionRequestGate } from '@services/notion/request-gate.js'
import type {
  NotionBlock,
  NotionClientConfig,
  NotionDatabase,
  NotionDatabaseRef,
  NotionFilter,
  NotionPage,
  NotionPaginatedList,
  NotionProperties,
  NotionPropertyValue,
  PropertyInput,
  QueryOptions,
  UpsertResult,
} from '@root/types/notion.types.js'
import {
  DatabaseNotResolvedError,
  DuplicateMatchError,
  errorMessage,
  NotionError,
} from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const DEFAULT_BASE_URL = 'https://api.notion.com/v1'
const DEFAULT_API_VERSION = '2022-06-28'
const DEFAULT_RETRY_BASE_DELAY_MS = 1000
/** Largest page size the query and block-children endpoints accept */
const PAGE_SIZE = 100

type HttpMethod = 'GET' | 'POST' | 'PATCH'

interface NotionErrorBody {
  code?: string
  message?: string
}

const isErrorBody = (value: unknown): value is NotionErrorBody =>
  typeof value === 'object' && value !== null

export class NotionService {
  private readonly gate: NotionRequestGate
  private readonly baseUrl: string
  /** Child databases of the warmed parent page, by title */
  private readonly databases = new Map<string, string>()

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly config: NotionClientConfig,
  ) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.gate = new NotionRequestGate(this.log, {
      maxConcurrent: config.maxConcurrent,
      minIntervalMs: config.minRequestIntervalMs,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
    })
  }

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'NOTION')
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    body?: unknown,
  ): Promise<T> {
    const response = await this.gate.fetch(`${this.baseUrl}/${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.config.token}`,
        'Notion-Version': this.config.apiVersion ?? DEFAULT_API_VERSION,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    })

    if (!response.ok) {
      const errorData: unknown = await response.json().catch(() => null)
      const body: NotionErrorBody = isErrorBody(errorData) ? errorData : {}
      throw new NotionError(
        `Notion API error: ${body.message ?? response.statusText}`,
        response.status,
        { code: body.code },
      )
    }

    return response.json() as Promise<T>
  }

  formatProperty(
    propertyType: string,
    value: PropertyInput,
    propertyName?: string,
  ): NotionPropertyValue {
    return formatProperty(propertyType, value, propertyName)
  }

  async getDatabaseSchema(
    databaseId: string,
  ): Promise<NotionDatabase['properties']> {
    this.log.debug(`Getting schema for database ${databaseId}`)
    const database = await this.request<NotionDatabase>(
      'GET',
      `databases/${databaseId}`,
    )
    return database.properties
  }

  /**
   * One page of query results.
   */
  async queryDatabase(
    databaseId: string,
    options: QueryOptions = {},
  ): Promise<NotionPaginatedList<NotionPage>> {
    const response = await this.request<NotionPaginatedList<NotionPage>>(
      'POST',
      `databases/${databaseId}/query`,
      {
        filter: options.filter,
        sorts: options.sorts,
        start_cursor: options.startCursor,
        page_size: options.pageSize ?? PAGE_SIZE,
      },
    )
    this.log.debug(
      `Retrieved ${response.results.length} rows from database ${databaseId}`,
    )
    return response
  }

  /**
   * Every row matching the query, following the cursor until exhausted.
   */
  async *queryAll(
    databaseId: string,
    options: Omit<QueryOptions, 'startCursor'> = {},
  ): AsyncGenerator<NotionPage> {
    let startCursor: string | undefined
    do {
      const page = await this.queryDatabase(databaseId, {
        ...options,
        startCursor,
      })
      yield* page.results
      startCursor = page.has_more && page.next_cursor ? page.next_cursor : undefined
    } while (startCursor)
  }

  /**
   * Child databases of a page, across all block-children pages.
   */
  async listChildDatabases(pageId: string): Promise<NotionDatabaseRef[]> {
    const databases: NotionDatabaseRef[] = []
    let startCursor: string | undefined
    do {
      const params = new URLSearchParams({ page_size: String(PAGE_SIZE) })
      if (startCursor) params.set('start_cursor', startCursor)
      const page = await this.request<NotionPaginatedList<NotionBlock>>(
        'GET',
        `blocks/${pageId}/children?${params.toString()}`,
      )
      for (const block of page.results) {
        if (block.type === 'child_database' && block.child_database) {
          databases.push({ id: block.id, title: block.child_database.title })
        }
      }
      startCursor = page.has_more && page.next_cursor ? page.next_cursor : undefined
    } while (startCursor)

    this.log.debug(`Found ${databases.length} child databases in ${pageId}`)
    return databases
  }

  /**
   * Resolves the child databases of `parentPageId` so that
   * {@link getDatabaseId} can answer without I/O. Replaces any earlier
   * resolution.
   */
  async warmDatabases(parentPageId: string): Promise<NotionDatabaseRef[]> {
    const databases = await this.listChildDatabases(parentPageId)
    this.databases.clear()
    for (const database of databases) {
      if (this.databases.has(database.title)) {
        this.log.warn(
          `Multiple databases titled "${database.title}" under ${parentPageId}, using ${database.id}`,
        )
      }
      this.databases.set(database.title, database.id)
    }
    this.log.info(
      `Resolved ${this.databases.size} databases under page ${parentPageId}`,
    )
    return databases
  }

  /**
   * @throws DatabaseNotResolvedError before warm-up, or for an unknown title
   */
  getDatabaseId(title: string): string {
    const id = this.databases.get(title)
    if (!id) {
      throw new DatabaseNotResolvedError(title)
    }
    return id
  }

  async createRow(
    databaseId: string,
    properties: NotionProperties,
  ): Promise<string> {
    const page = await this.request<NotionPage>('POST', 'pages', {
      parent: { database_id: databaseId },
      properties,
    })
    this.log.debug(`Created row ${page.id} in database ${databaseId}`)
    return page.id
  }

  async updateRow(pageId: string, properties: NotionProperties): Promise<string> {
    const page = await this.request<NotionPage>('PATCH', `pages/${pageId}`, {
      properties,
    })
    this.log.debug(`Updated row ${pageId}`)
    return page.id
  }

  async archiveRow(pageId: string): Promise<void> {
    await this.request<NotionPage>('PATCH', `pages/${pageId}`, {
      archived: true,
    })
  }

  /**
   * Upserts a row by natural key. Without a filter a row is always created.
   * When the filter matches several rows the configured duplicate policy
   * decides: update the first, update all, or throw.
   */
  async createOrUpdateRow(
    databaseId: string,
    properties: NotionProperties,
    matchFilter?: NotionFilter,
  ): Promise<UpsertResult> {
    if (!matchFilter) {
      const id = await this.createRow(databaseId, properties)
      return { id, action: 'created', matched: 0 }
    }

    const matches: NotionPage[] = []
    for await (const page of this.queryAll(databaseId, {
      filter: matchFilter,
    })) {
      matches.push(page)
    }

    const [first] = matches
    if (!first) {
      const id = await this.createRow(databaseId, properties)
      return { id, action: 'created', matched: 0 }
    }

    if (matches.length > 1) {
      switch (this.config.duplicateMatchPolicy) {
        case 'error':
          throw new DuplicateMatchError(databaseId, matches.length)
        case 'update-all':
          this.log.warn(
            { filter: matchFilter },
            `Filter matched ${matches.length} rows in database ${databaseId}, updating all`,
          )
          for (const page of matches) {
            await this.updateRow(page.id, properties)
          }
          return { id: first.id, action: 'updated', matched: matches.length }
        case 'update-first':
          this.log.warn(
            { filter: matchFilter },
            `Filter matched ${matches.length} rows in database ${databaseId}, updating the first`,
          )
          break
      }
    }

    const id = await this.updateRow(first.id, properties)
    return { id, action: 'updated', matched: matches.length }
  }

  /**
   * Archives every row matching `filter` (every row when omitted). Ids are
   * collected over all cursor pages before the first archive, so archiving
   * cannot shift the pages still to be read. A failed archive is logged and
   * skipped.
   *
   * @returns number of rows archived
   */
  async deleteRowsWhere(
    databaseId: string,
    filter?: NotionFilter,
  ): Promise<number> {
    const ids: string[] = []
    for await (const page of this.queryAll(databaseId, { filter })) {
      ids.push(page.id)
    }

    let deleted = 0
    for (const id of ids) {
      try {
        await this.archiveRow(id)
        deleted++
      } catch (error) {
        this.log.warn(
          { error },
          `Failed to delete page ${id}: ${errorMessage(error)}`,
        )
      }
    }

    if (ids.length > 0) {
      this.log.info(`Deleted ${deleted} of ${ids.length} rows from database ${databaseId}`)
    }
    return deleted
  }

  async clearDatabase(databaseId: string): Promise<number> {
    this.log.debug(`Clearing database ${databaseId}`)
    return this.deleteRowsWhere(databaseId)
  }
}
