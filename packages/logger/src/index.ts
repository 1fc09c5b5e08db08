export type LogLevel = "debug" | "info" | "warn" | "error"

export interface LogContext {
  requestId?: string
  fingerprint?: string
  operation?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  component: string
  message: string
  error?: string
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface LoggerOptions {
  component: string
  level?: LogLevel
  sink?: LogSink
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void
  info: (message: string, context?: LogContext) => void
  warn: (message: string, error?: unknown, context?: LogContext) => void
  error: (message: string, error?: unknown, context?: LogContext) => void
  child: (component: string) => Logger
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

// stderr keeps stdout free for piping binary output in scripts
function defaultSink(entry: LogEntry): void {
  console.error(JSON.stringify(entry))
}

function describeError(error: unknown): string | undefined {
  if (error === undefined) return undefined
  if (error instanceof Error) return `${error.name}: ${error.message}`
  return String(error)
}

export function createLogger(options: LoggerOptions): Logger {
  const { component, level = "info", sink = defaultSink } = options
  const threshold = LEVEL_ORDER[level]

  const log = (entryLevel: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) return

    const entry: LogEntry = { level: entryLevel, component, message, timestamp: new Date().toISOString() }
    const described = describeError(error)
    if (described !== undefined) entry.error = described
    if (context && Object.keys(context).length > 0) entry.context = context
    sink(entry)
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    child: name => createLogger({ component: `${component}:${name}`, level, sink }),
  }
}

/**
 * Sink that keeps entries in memory, for assertions in tests.
 */
export function createMemorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const sink = (entry: LogEntry) => {
    entries.push(entry)
  }
  return Object.assign(sink, { entries })
}
