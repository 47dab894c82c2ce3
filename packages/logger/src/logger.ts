import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Run cannot continue
 * - error (50): Failed operation (checkpoint save, session recovery)
 * - warn (40): Per-URL failures and degraded state
 * - info (30): Run lifecycle and progress lines (default)
 * - debug (20): Per-URL detail
 * - trace (10): WebDriver request detail
 *
 * Environment:
 * - LOG_LEVEL: minimum level, or `silent` (default `info`)
 * - LOG_FORMAT: `pretty` (default) or `json` for raw pino lines on stdout
 * - LOG_FILE: optional path that also receives raw JSON lines
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogLevel = (typeof LEVELS)[number]
type LogMethod = (msgOrObj: unknown, ...args: unknown[]) => void

type Log = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Log
}

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase()
  const match = LEVELS.find(level => level === normalized)
  return match ?? 'info'
}

function buildTransport(level: LogLevel): pino.TransportMultiOptions | undefined {
  if (level === 'silent') {
    return undefined
  }

  const targets: pino.TransportTargetOptions[] = []

  if (process.env.LOG_FORMAT === 'json') {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } })
  } else {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{if context}[{context}] {end}{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
      }
    })
  }

  const logFile = process.env.LOG_FILE?.trim()
  if (logFile) {
    targets.push({ target: 'pino/file', level, options: { destination: logFile, mkdir: true } })
  }

  return { targets }
}

const logLevel = resolveLevel(process.env.LOG_LEVEL)

const baseLogger = pino({
  level: logLevel,
  transport: buildTransport(logLevel)
})

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }

  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg)
  }

  return String(arg)
}

/**
 * Lets call sites pass `log.info('Checkpoint saved', { index })` the same way
 * they would with console, while pino still receives a single message string.
 */
const createLoggerWrapper = (logger: pino.Logger): Log => {
  const wrap = (level: Exclude<LogLevel, 'silent'>): LogMethod => {
    return (msgOrObj, ...args) => {
      if (!logger.isLevelEnabled(level)) {
        return
      }

      const message = [msgOrObj, ...args].map(formatArg).join(' ')
      logger[level](message)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Process-wide logger.
 *
 * @example
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Resuming run', { offset: 1200 });
 * log.warn('Render failed:', error);
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Child logger whose lines are prefixed with `[context]`.
 *
 * @example
 * ```typescript
 * const driverLog = createLogger('driver');
 * driverLog.info('Checkpoint saved');
 * ```
 */
export function createLogger(context: string): Log {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level
}

export type { Log, LogLevel }
