// Structured JSON logger. One line per entry, errors go to stderr.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  reservationId?: string
  roomId?: string
  error?: {
    code?: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

export type LogFields = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'message'>>

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value)
}

const envLevel = process.env.LOG_LEVEL ?? ''
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

export function setLogLevel(level: LogLevel): void {
  minLevel = level
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry)
  if (entry.level === 'error') {
    process.stderr.write(line + '\n')
  } else {
    process.stdout.write(line + '\n')
  }
}

export function log(level: LogLevel, message: string, fields?: LogFields): void {
  if (!shouldLog(level)) return
  emit({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...fields,
  })
}

// Flattens an unknown thrown value into the `error` field of a log entry.
export function errorFields(err: unknown): LogEntry['error'] {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
    return { code, message: err.message, stack: err.stack }
  }
  return { message: String(err) }
}

export const logger: Logger = {
  debug: (message, fields) => log('debug', message, fields),
  info: (message, fields) => log('info', message, fields),
  warn: (message, fields) => log('warn', message, fields),
  error: (message, fields) => log('error', message, fields),
}
