import type { FastifyRequest } from 'fastify'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

const { createLoggerConfig, createServiceLogger, redactUrl, validLogLevels } =
  await import('@utils/logger.js')

function serializers() {
  process.env.enableConsoleOutput = 'false'
  const config = createLoggerConfig()
  const error = config.serializers?.error
  const req = config.serializers?.req
  if (!error || !req) {
    throw new Error('logger config has no serializers')
  }
  return { error, req }
}

describe('logger', () => {
  afterEach(() => {
    delete process.env.enableConsoleOutput
  })

  describe('validLogLevels', () => {
    it('should export all pino log levels plus silent', () => {
      expect(validLogLevels).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ])
    })
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with a bracketed prefix', () => {
      const logger = createMockLogger()

      const child = createServiceLogger(logger, 'NOTION')

      expect(logger.child).toHaveBeenCalledWith({}, { msgPrefix: '[NOTION] ' })
      expect(child).toBe(logger)
    })
  })

  describe('redactUrl', () => {
    it('should redact credential query parameters', () => {
      expect(
        redactUrl('/channels?part=statistics&key=test-youtube-key&id=UC1'),
      ).toBe('/channels?part=statistics&key=[REDACTED]&id=UC1')
    })

    it('should be case-insensitive', () => {
      expect(redactUrl('/webhook?APIKEY=test-secret')).toBe(
        '/webhook?APIKEY=[REDACTED]',
      )
    })

    it('should leave URLs without credentials untouched', () => {
      expect(redactUrl('/calendar?past_days=7')).toBe('/calendar?past_days=7')
    })
  })

  describe('createLoggerConfig', () => {
    beforeEach(() => {
      vi.clearAllMocks()
    })

    it('should return a file-only config when console output is disabled', () => {
      process.env.enableConsoleOutput = 'false'

      const config = createLoggerConfig()

      expect(config).toHaveProperty('level', 'info')
      expect(config).toHaveProperty('stream')
      expect(config).not.toHaveProperty('transport')
    })
  })

  describe('error serializer', () => {
    it('should serialize primitive errors', () => {
      const { error } = serializers()

      expect(error('string error')).toEqual({
        message: 'string error',
        type: 'StringError',
      })
    })

    it('should serialize an Error with its type and stack', () => {
      const { error } = serializers()

      const result = error(new TypeError('bad input'))

      expect(result).toMatchObject({
        message: 'bad input',
        name: 'TypeError',
        type: 'TypeError',
      })
      expect(result.stack).toContain('TypeError: bad input')
    })

    it('should keep the status and drop the stack for client errors', () => {
      const { error } = serializers()
      const err = Object.assign(new Error('Not Found'), { status: 404 })

      const result = error(err)

      expect(result.status).toBe(404)
      expect(result).not.toHaveProperty('stack')
    })

    it('should serialize the cause chain', () => {
      const { error } = serializers()
      const err = new Error('YouTube request failed', {
        cause: new Error('socket hang up'),
      })

      const result = error(err)

      expect(result.cause).toMatchObject({
        message: 'socket hang up',
        type: 'Error',
      })
    })

    it('should treat plain objects without a name as UnknownError', () => {
      const { error } = serializers()

      expect(error({ message: 'oops', code: 'E_OOPS' })).toEqual({
        message: 'oops',
        type: 'UnknownError',
        code: 'E_OOPS',
      })
    })
  })

  describe('request serializer', () => {
    it('should serialize request details with redacted credentials', () => {
      const { req } = serializers()
      const request = {
        method: 'POST',
        url: '/webhook?apiKey=test-secret',
        headers: { host: 'localhost:8000' },
        ip: '127.0.0.1',
        socket: { remotePort: 54321 },
      } as unknown as FastifyRequest

      expect(req(request)).toEqual({
        method: 'POST',
        url: '/webhook?apiKey=[REDACTED]',
        host: 'localhost:8000',
        remoteAddress: '127.0.0.1',
        remotePort: 54321,
      })
    })
  })
})
