import fs from 'node:fs'
import util from 'node:util'
import pino, { type LoggerOptions } from 'pino'

const isTest = Boolean(process.env.VITEST)

const getTimezone = () => {
  if (process.env.TZ) {
    return process.env.TZ
  }
  try {
    return fs.readFileSync('/etc/timezone', 'utf8').trim()
  } catch {
    // macOS keeps the zone only in the /etc/localtime symlink
    try {
      const match = fs.readlinkSync('/etc/localtime').match(/zoneinfo\/(.*)/)
      if (match) {
        return match[1]
      }
    } catch {
      // fall through to UTC
    }
    return 'UTC'
  }
}

const timeZone = getTimezone()

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  timestamp: () =>
    `,"time":"${new Date().toLocaleString(undefined, {
      timeZone,
    })}"`,
}

// The pretty transport runs in a worker thread, which vitest has no use for
const baseLogger = isTest
  ? pino(options)
  : pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        },
      },
    })

const stringifyArgs = (args: unknown[]): string => {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`
      }
      if (typeof arg === 'object' && arg !== null) {
        return util.inspect(arg, { colors: !isTest, depth: null })
      }
      return String(arg)
    })
    .join(' ')
}

export interface Logger {
  info: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

const createLogger = (name: string): Logger => {
  const logger = baseLogger.child({
    name: name.toUpperCase(),
  })

  return {
    info: (...args: unknown[]) => logger.info(stringifyArgs(args)),
    error: (...args: unknown[]) => logger.error(stringifyArgs(args)),
    warn: (...args: unknown[]) => logger.warn(stringifyArgs(args)),
    debug: (...args: unknown[]) => logger.debug(stringifyArgs(args)),
  }
}

export default createLogger
