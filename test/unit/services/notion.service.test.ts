import { NotionService } from '@services/notion.service.js'
import { and, dateBefore, equals } from '@services/notion/filters.js'
import { formatProperties } from '@services/notion/property-formatter.js'
import type { DuplicateMatchPolicy } from '@root/types/notion.types.js'
import {
  DatabaseNotResolvedError,
  DuplicateMatchError,
  NotionError,
  UnsupportedPropertyTypeError,
} from '@utils/errors.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { FakeNotion, NOTION_BASE_URL } from '../../mocks/notion-api.js'
import { server } from '../../setup/msw-setup.js'

const DB = 'db-calendar'

const row = (episodeId: number, date: string, name = 'Show A') =>
  formatProperties({
    Name: { type: 'title', value: name },
    'Episode ID': { type: 'number', value: episodeId },
    Date: { type: 'date', value: date },
  })

describe('NotionService', () => {
  let fake: FakeNotion
  let logger: ReturnType<typeof createMockLogger>

  const createService = (policy: DuplicateMatchPolicy = 'update-first') =>
    new NotionService(logger, {
      token: 'test-notion-token',
      maxConcurrent: 3,
      minRequestIntervalMs: 0,
      maxRetries: 2,
      retryBaseDelayMs: 1,
      duplicateMatchPolicy: policy,
    })

  beforeEach(() => {
    logger = createMockLogger()
    fake = new FakeNotion()
    fake.addDatabase(DB, 'Upcoming Episodes')
    fake.addDatabase('db-stats', 'Channel Stats')
    server.use(...fake.handlers())
  })

  describe('database resolution', () => {
    it('should fail before warm-up', () => {
      const service = createService()

      expect(() => service.getDatabaseId('Upcoming Episodes')).toThrow(
        DatabaseNotResolvedError,
      )
    })

    it('should resolve child databases by title after warm-up', async () => {
      const service = createService()

      const databases = await service.warmDatabases('parent-page')

      expect(databases).toEqual([
        { id: DB, title: 'Upcoming Episodes' },
        { id: 'db-stats', title: 'Channel Stats' },
      ])
      expect(service.getDatabaseId('Channel Stats')).toBe('db-stats')
      expect(() => service.getDatabaseId('Nope')).toThrow(
        'Database "Nope" has not been resolved; call warmDatabases() first',
      )
    })

    it('should follow block-children cursors and skip other blocks', async () => {
      server.use(
        http.get(
          `${NOTION_BASE_URL}/blocks/paged-parent/children`,
          ({ request }) => {
            const cursor = new URL(request.url).searchParams.get('start_cursor')
            if (!cursor) {
              return HttpResponse.json({
                object: 'list',
                results: [
                  { object: 'block', id: 'p1', type: 'paragraph' },
                  {
                    object: 'block',
                    id: 'db-1',
                    type: 'child_database',
                    child_database: { title: 'First' },
                  },
                ],
                has_more: true,
                next_cursor: 'cursor-2',
              })
            }
            return HttpResponse.json({
              object: 'list',
              results: [
                {
                  object: 'block',
                  id: 'db-2',
                  type: 'child_database',
                  child_database: { title: 'Second' },
                },
              ],
              has_more: false,
              next_cursor: null,
            })
          },
        ),
      )

      const databases = await createService().listChildDatabases('paged-parent')

      expect(databases).toEqual([
        { id: 'db-1', title: 'First' },
        { id: 'db-2', title: 'Second' },
      ])
    })
  })

  describe('requests', () => {
    it('should authenticate with the token and pin the API version', async () => {
      let headers: Headers | undefined
      server.use(
        http.get(`${NOTION_BASE_URL}/databases/db-headers`, ({ request }) => {
          headers = request.headers
          return HttpResponse.json({ object: 'database', id: 'db-headers', properties: {} })
        }),
      )

      await createService().getDatabaseSchema('db-headers')

      expect(headers?.get('authorization')).toBe('Bearer test-notion-token')
      expect(headers?.get('notion-version')).toBe('2022-06-28')
    })

    it('should raise API errors as NotionError with the Notion code', async () => {
      const error = await createService()
        .getDatabaseSchema('missing-db')
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(NotionError)
      expect(error).toMatchObject({
        message: 'Notion API error: Not found',
        status: 404,
        code: 'object_not_found',
      })
    })
  })

  describe('queryAll', () => {
    it('should yield rows across every cursor page', async () => {
      fake.pageSize = 2
      for (let i = 1; i <= 5; i++) fake.seedRow(DB, row(i, '2024-12-03'))
      const service = createService()

      const ids: string[] = []
      for await (const page of service.queryAll(DB)) ids.push(page.id)

      expect(ids).toHaveLength(5)
      expect(fake.count('POST', `/databases/${DB}/query`)).toBe(3)
    })
  })

  describe('createOrUpdateRow', () => {
    it('should update the single matching row in place', async () => {
      const existing = fake.seedRow(DB, row(7, '2024-12-03', 'Old Name'))
      fake.seedRow(DB, row(8, '2024-12-03'))
      const service = createService()

      const result = await service.createOrUpdateRow(
        DB,
        row(7, '2024-12-03', 'New Name'),
        and(equals('Episode ID', 'number', 7), equals('Date', 'date', '2024-12-03')),
      )

      expect(result).toEqual({ id: existing, action: 'updated', matched: 1 })
      expect(fake.rows(DB)).toHaveLength(2)
      expect(fake.rows(DB)[0]?.properties.Name).toEqual({
        title: [{ text: { content: 'New Name' } }],
      })
      expect(fake.count('POST', '/pages')).toBe(0)
    })

    it('should create a row with a fresh id when nothing matches', async () => {
      const existing = fake.seedRow(DB, row(7, '2024-12-03'))
      const service = createService()

      const result = await service.createOrUpdateRow(
        DB,
        row(7, '2024-12-04'),
        and(equals('Episode ID', 'number', 7), equals('Date', 'date', '2024-12-04')),
      )

      expect(result.action).toBe('created')
      expect(result.matched).toBe(0)
      expect(result.id).not.toBe(existing)
      expect(fake.rows(DB)).toHaveLength(2)
    })

    it('should always create without a filter', async () => {
      fake.seedRow(DB, row(7, '2024-12-03'))
      const service = createService()

      const result = await service.createOrUpdateRow(DB, row(7, '2024-12-03'))

      expect(result.action).toBe('created')
      expect(fake.count('POST', `/databases/${DB}/query`)).toBe(0)
      expect(fake.rows(DB)).toHaveLength(2)
    })

    describe('duplicate matches', () => {
      let first: string
      let second: string
      const filter = equals('Episode ID', 'number', 7)

      beforeEach(() => {
        first = fake.seedRow(DB, row(7, '2024-12-03', 'Dup 1'))
        second = fake.seedRow(DB, row(7, '2024-12-03', 'Dup 2'))
      })

      it('should update only the first row and warn by default', async () => {
        const result = await createService().createOrUpdateRow(
          DB,
          row(7, '2024-12-03', 'Fixed'),
          filter,
        )

        expect(result).toEqual({ id: first, action: 'updated', matched: 2 })
        expect(fake.count('PATCH', `/pages/${first}`)).toBe(1)
        expect(fake.count('PATCH', `/pages/${second}`)).toBe(0)
        expect(logger.warn).toHaveBeenCalledWith(
          { filter },
          `Filter matched 2 rows in database ${DB}, updating the first`,
        )
      })

      it('should update every match under update-all', async () => {
        await createService('update-all').createOrUpdateRow(
          DB,
          row(7, '2024-12-03', 'Fixed'),
          filter,
        )

        expect(fake.count('PATCH', `/pages/${first}`)).toBe(1)
        expect(fake.count('PATCH', `/pages/${second}`)).toBe(1)
      })

      it('should throw and write nothing under error', async () => {
        await expect(
          createService('error').createOrUpdateRow(DB, row(7, '2024-12-03'), filter),
        ).rejects.toThrow(DuplicateMatchError)

        expect(fake.count('PATCH', '/pages')).toBe(0)
        expect(fake.count('POST', '/pages')).toBe(0)
      })
    })
  })

  describe('deleteRowsWhere', () => {
    it('should return 0 and archive nothing when no row matches', async () => {
      fake.seedRow(DB, row(1, '2024-12-05'))

      const deleted = await createService().deleteRowsWhere(
        DB,
        dateBefore('Date', '2024-12-03'),
      )

      expect(deleted).toBe(0)
      expect(fake.count('PATCH', '/pages')).toBe(0)
    })

    it('should archive matching rows across cursor pages', async () => {
      fake.pageSize = 2
      for (let i = 1; i <= 5; i++) fake.seedRow(DB, row(i, '2024-11-20'))
      fake.seedRow(DB, row(6, '2024-12-05'))

      const deleted = await createService().deleteRowsWhere(
        DB,
        dateBefore('Date', '2024-12-03'),
      )

      expect(deleted).toBe(5)
      expect(fake.rows(DB).map((r) => r.properties['Episode ID'])).toEqual([
        { number: 6 },
      ])
    })

    it('should log and skip a row whose archive fails', async () => {
      const failing = fake.seedRow(DB, row(1, '2024-11-20'))
      fake.seedRow(DB, row(2, '2024-11-21'))
      fake.failingArchives.add(failing)

      const deleted = await createService().deleteRowsWhere(
        DB,
        dateBefore('Date', '2024-12-03'),
      )

      expect(deleted).toBe(1)
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ error: expect.any(NotionError) }),
        `Failed to delete page ${failing}: Notion API error: Boom`,
      )
    })

    it('should clear a whole table', async () => {
      fake.seedRow('db-stats', row(1, '2024-11-20'))
      fake.seedRow('db-stats', row(2, '2024-11-21'))

      await expect(createService().clearDatabase('db-stats')).resolves.toBe(2)
      expect(fake.rows('db-stats')).toEqual([])
    })
  })

  describe('formatProperty', () => {
    it('should reject an unsupported type before any request', () => {
      const service = createService()

      expect(() => service.formatProperty('formula', 'x')).toThrow(
        UnsupportedPropertyTypeError,
      )
      expect(fake.requests).toEqual([])
    })
  })
})
