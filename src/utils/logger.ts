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

export type AppLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env early so the logger sees logLevel and output toggles
config({ path: resolve(projectRoot, '.env') })

const SENSITIVE_QUERY_PARAMS = ['access_token', 'token', 'refresh_token']

type SerializableError = Error | Record<string, unknown> | string | number | boolean

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return validLogLevels.some((level) => level === value)
}

function resolveLogLevel(): LevelWithSilent {
  const level = process.env.logLevel
  return isLogLevel(level) ? level : 'info'
}

/**
 * Serializes errors for pino, keeping custom fields such as `code`, `phase`
 * and `chunkIndex` of reconciliation errors and walking `cause`.
 * Stack traces are dropped for 4xx errors.
 */
function createErrorSerializer() {
  const serialize = (err: SerializableError | null | undefined): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof AggregateError) {
      serialized.type = 'AggregateError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    if ('stack' in err && err.stack && (!statusCode || statusCode >= 500)) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : cause
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Returns a request serializer that redacts access tokens from the logged URL
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    let url = req.url
    if (url) {
      for (const param of SENSITIVE_QUERY_PARAMS) {
        url = url.replace(
          new RegExp(`([?&])${param}=([^&]+)`, 'gi'),
          `$1${param}=[REDACTED]`,
        )
      }
    }

    return {
      method: req.method,
      url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }
  }
}

/**
 * Log file name for a rotation: `playlist-radar-YYYY-MM-DD[-index].log`
 */
export function logFilename(time: number | Date | null, index?: number): string {
  if (!time) return 'playlist-radar-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `playlist-radar-${year}-${month}-${day}${indexStr}.log`
}

function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(logFilename, {
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

function serializers() {
  return {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }
}

/**
 * Builds logger options from the environment.
 *
 * - `logLevel`: pino level (default info)
 * - `logDestination`: `terminal`, `file` or `both` (default terminal)
 */
export function createLoggerConfig(): AppLoggerOptions {
  const level = resolveLogLevel()
  const destination = process.env.logDestination ?? 'terminal'

  if (destination === 'file') {
    return { level, stream: getFileStream(), serializers: serializers() }
  }

  if (destination === 'both') {
    const fileStream = getFileStream()
    if (fileStream !== process.stdout) {
      const prettyStream = pino.transport({
        target: 'pino-pretty',
        options: prettyOptions,
      })
      return {
        level,
        stream: pino.multistream([
          { stream: prettyStream },
          { stream: fileStream },
        ]),
        serializers: serializers(),
      }
    }
  }

  return {
    level,
    transport: { target: 'pino-pretty', options: prettyOptions },
    serializers: serializers(),
  }
}

/**
 * Child logger whose messages carry a `[NAME] ` prefix
 *
 * @example
 * const log = createServiceLogger(fastify.log, 'playlist_sync')
 * log.info('Run started') // "[PLAYLIST_SYNC] Run started"
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
