import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type AppLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

// Logger options are built before @fastify/env runs
config({ path: resolve(projectRoot, '.env') })

const REDACTED_QUERY_PARAMS = ['apiKey', 'api_key', 'token', 'key']

type Serializable = Error | Record<string, unknown> | string | number | boolean

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

/**
 * Serializes errors with their `cause` chain. Stack traces are dropped for
 * 4xx statuses.
 */
function createErrorSerializer() {
  const serialize = (err: Serializable): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const kind = typeof err
      return {
        message: String(err),
        type: `${kind.charAt(0).toUpperCase()}${kind.slice(1)}Error`,
      }
    }

    const serialized: Record<string, unknown> = {}
    const record: Record<string, unknown> = { ...err }

    if (err instanceof Error) {
      serialized.message = err.message
      serialized.name = err.name
      serialized.type = err.constructor.name
    } else {
      if (typeof record.message === 'string') serialized.message = record.message
      if (typeof record.name === 'string') serialized.name = record.name
      serialized.type =
        typeof record.name === 'string' ? record.name : 'UnknownError'
    }

    const status =
      typeof record.statusCode === 'number'
        ? record.statusCode
        : typeof record.status === 'number'
          ? record.status
          : undefined
    if (status !== undefined) serialized.status = status

    if (err instanceof Error && err.stack && (!status || status >= 500)) {
      serialized.stack = err.stack
    }

    const cause = err instanceof Error ? err.cause : record.cause
    if (
      cause instanceof Error ||
      isRecord(cause) ||
      typeof cause === 'string'
    ) {
      serialized.cause = serialize(cause)
    }

    for (const [key, value] of Object.entries(record)) {
      if (!['message', 'stack', 'name', 'status', 'cause'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }
  return serialize
}

/**
 * Redacts credential query parameters from a request or upstream URL.
 */
export function redactUrl(url: string): string {
  return REDACTED_QUERY_PARAMS.reduce(
    (acc, param) =>
      acc.replace(
        new RegExp(`([?&])(${param})=([^&]+)`, 'gi'),
        '$1$2=[REDACTED]',
      ),
    url,
  )
}

function createRequestSerializer() {
  return (req: FastifyRequest) => ({
    method: req.method,
    url: redactUrl(req.url),
    host: req.headers.host,
    remoteAddress: req.ip,
    remotePort: req.socket.remotePort,
  })
}

function filename(time: number | Date, index?: number): string {
  if (!time) return 'telly-sync-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `telly-sync-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under `data/logs`, or stdout if the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const prettyOptions = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

const serializers = () => ({
  req: createRequestSerializer(),
  error: createErrorSerializer(),
  err: createErrorSerializer(),
})

/**
 * Builds the Fastify logger options.
 *
 * Logs always go to a rotating file. Environment variables:
 * - enableConsoleOutput: also print to the terminal (default: true)
 * - enableRequestLogging: Fastify request logging (default: true)
 */
export function createLoggerConfig(): AppLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'
  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return { level: 'info', stream: fileStream, serializers: serializers() }
  }

  if (fileStream === process.stdout) {
    return {
      level: 'info',
      transport: { target: 'pino-pretty', options: prettyOptions },
      serializers: serializers(),
    }
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: prettyOptions,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: serializers(),
  }
}

export const isRequestLoggingEnabled = (): boolean =>
  process.env.enableRequestLogging !== 'false'

/**
 * Child logger whose messages are prefixed with `[NAME]`.
 *
 * @example
 * private get log() {
 *   return createServiceLogger(this.baseLog, 'NOTION')
 * }
 */
export function createServiceLogger(
  baseLog: FastifyBaseLogger,
  name: string,
): FastifyBaseLogger {
  return baseLog.child({}, { msgPrefix: `[${name}] ` })
}
